import * as path from "path";
import { createRequire } from "module";

import { DefinitionError } from "../engine/errors";
import { ToolHandle, ToolOptions } from "../engine/generate";
import { CachedSession } from "../engine/session";

/**
 * Adapter for one external tool.
 *
 * Plugins register themselves in `plugins`; a step picks one by name, there is no probing.
 */
export interface ToolPlugin {
    name: string;
    /** Tool files used when a step names none, e.g. the project's own compiler. */
    defaultToolPaths(): string[];
    createHandle(toolPaths: string[], settings: ToolOptions): Promise<ToolHandle>;
    releaseHandle?(handle: ToolHandle): void | Promise<void>;
}

export const plugins: ToolPlugin[] = [];

export function selectToolPlugin(name: string): ToolPlugin {
    const plugin = plugins.find(p => p.name === name);
    if (plugin === undefined) {
        throw new DefinitionError(`unknown tool '${name}', known tools: ${plugins.map(p => p.name).join(", ")}`);
    }
    return plugin;
}

/**
 * New session bound to `plugin` with fixed `settings`.
 */
export function createToolSession(plugin: ToolPlugin, settings: ToolOptions = {}, name: string = plugin.name) {
    return new CachedSession<ToolHandle>({
        name,
        create: toolPaths => plugin.createHandle(toolPaths, settings),
        release: plugin.releaseHandle !== undefined ? handle => plugin.releaseHandle?.(handle) : undefined
    });
}

/**
 * `require` resolving from the current working directory, where the project's tools are installed.
 */
export function projectRequire(): NodeRequire {
    return createRequire(path.join(process.cwd(), "package.json"));
}

/**
 * Loads a CommonJS module by absolute path, bypassing anything cached for it.
 */
export function loadFresh(modulePath: string): unknown {
    const load = projectRequire();
    const resolved = load.resolve(modulePath);
    delete load.cache[resolved];
    return load(resolved);
}

export function unload(modulePath: string) {
    const load = projectRequire();
    delete load.cache[load.resolve(modulePath)];
}
