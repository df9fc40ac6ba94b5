import { promises as fs } from "fs";
import * as path from "path";

import { AggregateResult } from "./aggregate";
import { DefinitionError } from "./errors";
import { createLogger } from "./log";

const log = createLogger("manifest");

/**
 * Tooling a bundle build needs on top of the aggregated dependencies.
 */
export const DEFAULT_BUNDLER_DEV_DEPENDENCIES: Readonly<Record<string, string>> = {
    webpack: "4.43.0",
    "webpack-merge": "4.2.2",
    "webpack-cli": "3.3.11",
    "source-map-loader": "1.0.0",
    "scalajs-friendly-source-map-loader": "0.1.5"
};

export interface PackageManifest {
    dependencies: Record<string, string>;
    devDependencies: Record<string, string>;
}

/**
 * Consumes an aggregate and writes what an external tool reads from its working directory.
 */
export interface ManifestWriter {
    write(result: AggregateResult, destinationDir: string): Promise<string[]>;
}

/**
 * Later declarations of the same package replace earlier ones.
 */
export function packageManifest(
    result: AggregateResult,
    extraDevDependencies: Readonly<Record<string, string>> = {}
): PackageManifest {
    const manifest: PackageManifest = { dependencies: {}, devDependencies: {} };
    for (const dep of result.dependencies) {
        const target = dep.scope === "dev" ? manifest.devDependencies : manifest.dependencies;
        target[dep.name] = dep.version;
    }
    Object.assign(manifest.devDependencies, extraDevDependencies);
    return manifest;
}

export function renderPackageManifest(
    result: AggregateResult,
    extraDevDependencies: Readonly<Record<string, string>> = {}
): string {
    return JSON.stringify(packageManifest(result, extraDevDependencies), null, 2) + "\n";
}

/**
 * Path of fragment `id` below `destinationDir`; ids escaping it are rejected.
 */
export function fragmentPath(destinationDir: string, id: string): string {
    const root = path.resolve(destinationDir);
    const target = path.resolve(root, id);
    const relative = path.relative(root, target);
    if (relative === "" || relative === ".." || relative.startsWith(".." + path.sep) || path.isAbsolute(relative)) {
        throw new DefinitionError(`fragment '${id}' resolves outside of ${root}`);
    }
    return target;
}

/**
 * Writes `package.json` and one file per source fragment.
 *
 * Existing files are overwritten, other files in the destination are left alone.
 */
export class PackageManifestWriter implements ManifestWriter {
    constructor(
        readonly extraDevDependencies: Readonly<Record<string, string>> = {},
        readonly manifestFileName: string = "package.json"
    ) {}

    async write(result: AggregateResult, destinationDir: string): Promise<string[]> {
        const root = path.resolve(destinationDir);
        const manifestPath = path.join(root, this.manifestFileName);
        const targets = Array.from(result.fragments, ([id, entry]) => ({ id, entry, target: fragmentPath(root, id) }));
        const clash = targets.find(({ target }) => target === manifestPath);
        if (clash !== undefined) {
            throw new DefinitionError(`fragment '${clash.id}' from ${clash.entry.origin} would overwrite ${this.manifestFileName}`);
        }

        await fs.mkdir(root, { recursive: true });
        const written: string[] = [];
        for (const { entry, target } of targets) {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, entry.content);
            written.push(target);
        }

        await fs.writeFile(manifestPath, renderPackageManifest(result, this.extraDevDependencies));
        written.push(manifestPath);

        log.debug("#write %s: %d files", root, written.length);
        return written;
    }
}
