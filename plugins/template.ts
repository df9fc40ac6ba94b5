import { promises as fs } from "fs";
import * as _ from "lodash";
import * as path from "path";

import { ToolHandle, ToolOptions } from "../engine/generate";
import { FormatTag } from "../engine/formats";
import { createLogger } from "../engine/log";
import { loadFresh, plugins, projectRequire, ToolPlugin, unload } from "./protocol";

const log = createLogger("template");

const FORMAT_DIRECTORIES: Record<FormatTag, string> = {
    HtmlFormat: "html",
    XmlFormat: "xml",
    JavaScriptFormat: "js",
    TxtFormat: "txt"
};

// `<%- %>` escapes markup only in these, elsewhere it interpolates as is.
const ESCAPED_FORMATS: ReadonlySet<FormatTag> = new Set<FormatTag>(["HtmlFormat", "XmlFormat"]);

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export interface TemplateHelpers {
    /** Helper module path => exported names, in load order. */
    modules: Map<string, string[]>;
}

async function loadHelpers(toolPaths: string[]): Promise<TemplateHelpers> {
    const modules = new Map<string, string[]>();
    for (const helperPath of toolPaths) {
        const resolved = path.resolve(helperPath);
        const exported = loadFresh(resolved);
        if (typeof exported !== "object" || exported === null) {
            throw new Error(`${resolved}: template helpers must export an object`);
        }
        const names = Object.keys(exported);
        const invalid = names.filter(name => !IDENTIFIER.test(name));
        if (invalid.length > 0) {
            throw new Error(`${resolved}: helper names are not identifiers: ${invalid.join(", ")}`);
        }
        modules.set(resolved, names);
    }
    return { modules };
}

/**
 * Source of a CommonJS module exporting `{ format, render }` for one compiled template.
 */
export function renderTemplateModule(
    templateSource: string,
    sourceName: string,
    format: FormatTag,
    helpers: TemplateHelpers,
    lodashPath: string
): string {
    const compiled = _.template(templateSource, { sourceURL: sourceName });
    // No "use strict": lodash renders through `with (obj)`.
    const lines = [
        `// Generated by kiln from ${sourceName} (${format}), do not edit.`,
        ESCAPED_FORMATS.has(format)
            ? `const _ = require(${JSON.stringify(lodashPath)});`
            : `const _ = Object.assign(Object.create(require(${JSON.stringify(lodashPath)})), { escape: String });`
    ];
    for (const [helperPath, names] of helpers.modules) {
        if (names.length > 0) {
            lines.push(`const { ${names.join(", ")} } = require(${JSON.stringify(helperPath)});`);
        }
    }
    lines.push(`module.exports = {`, `    format: ${JSON.stringify(format)},`, `    render: ${compiled.source}`, `};`, ``);
    return lines.join("\n");
}

export function templateOutputPath(inputPath: string, inputRoot: string, outputRoot: string, format: FormatTag): string {
    return path.join(outputRoot, FORMAT_DIRECTORIES[format], `${path.relative(inputRoot, inputPath)}.js`);
}

class TemplateHandle implements ToolHandle {
    readonly concurrentSafe = true;

    constructor(readonly helpers: TemplateHelpers, readonly lodashPath: string) {}

    async invoke(inputPath: string, inputRoot: string, outputRoot: string, format: FormatTag): Promise<string[]> {
        const source = await fs.readFile(inputPath, "utf-8");
        const sourceName = path.relative(inputRoot, inputPath);
        const moduleSource = renderTemplateModule(source, sourceName, format, this.helpers, this.lodashPath);

        const target = templateOutputPath(inputPath, inputRoot, outputRoot, format);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, moduleSource);
        return [target];
    }
}

/**
 * Compiles lodash templates into render modules, one directory per output format.
 *
 * Tool paths are helper modules; their exports are in scope inside every template.
 */
export class TemplatePlugin implements ToolPlugin {
    static instance = new TemplatePlugin();

    readonly name = "template";

    defaultToolPaths(): string[] {
        return [];
    }

    async createHandle(toolPaths: string[], _settings: ToolOptions): Promise<ToolHandle> {
        const helpers = await loadHelpers(toolPaths);
        log.debug("#createHandle helpers %o", Array.from(helpers.modules.keys()));
        return new TemplateHandle(helpers, projectRequire().resolve("lodash"));
    }

    releaseHandle(handle: ToolHandle) {
        if (handle instanceof TemplateHandle) {
            for (const helperPath of handle.helpers.modules.keys()) {
                unload(helperPath);
            }
        }
    }
}

plugins.push(TemplatePlugin.instance);
