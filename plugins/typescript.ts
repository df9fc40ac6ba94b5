import { promises as fs } from "fs";
import * as path from "path";
import type * as ts from "typescript";

import { ToolHandle, ToolOptions } from "../engine/generate";
import { createLogger } from "../engine/log";
import { loadFresh, plugins, projectRequire, ToolPlugin, unload } from "./protocol";

const log = createLogger("typescript");

type TypeScriptCompiler = typeof ts;

function isTypeScriptCompiler(value: unknown): value is TypeScriptCompiler {
    return (
        typeof value === "object" &&
        value !== null &&
        "version" in value &&
        typeof value.version === "string" &&
        "transpileModule" in value &&
        typeof value.transpileModule === "function" &&
        "convertCompilerOptionsFromJson" in value &&
        typeof value.convertCompilerOptionsFromJson === "function"
    );
}

export function formatDiagnostic(compiler: TypeScriptCompiler, diagnostic: ts.Diagnostic): string {
    const message = compiler.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
    const category = compiler.DiagnosticCategory[diagnostic.category];
    if (diagnostic.file && diagnostic.start !== undefined) {
        const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
        return `${category} ${diagnostic.file.fileName} (${line + 1},${character + 1}): ${message}`;
    }
    return `${category}: ${message}`;
}

/**
 * `foo/bar.ts` => `foo/bar.js`, likewise for `.tsx`, `.mts` and `.cts`.
 */
export function emittedName(relativePath: string): string {
    const ext = path.extname(relativePath);
    const base = relativePath.substring(0, relativePath.length - ext.length);
    switch (ext) {
        case ".mts":
            return `${base}.mjs`;
        case ".cts":
            return `${base}.cjs`;
        case ".ts":
        case ".tsx":
            return `${base}.js`;
        default:
            return relativePath;
    }
}

class TranspileHandle implements ToolHandle {
    readonly concurrentSafe = true;

    constructor(readonly compiler: TypeScriptCompiler, readonly compilerOptions: ts.CompilerOptions, readonly entry: string) {}

    async invoke(inputPath: string, inputRoot: string, outputRoot: string): Promise<string[]> {
        const source = await fs.readFile(inputPath, "utf-8");
        const output = this.compiler.transpileModule(source, {
            compilerOptions: this.compilerOptions,
            fileName: inputPath,
            reportDiagnostics: true
        });

        const errors = (output.diagnostics ?? []).filter(d => d.category === this.compiler.DiagnosticCategory.Error);
        if (errors.length > 0) {
            throw new Error(errors.map(d => formatDiagnostic(this.compiler, d)).join("\n"));
        }

        const target = path.join(outputRoot, emittedName(path.relative(inputRoot, inputPath)));
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, output.outputText);
        const written = [target];
        if (output.sourceMapText !== undefined) {
            await fs.writeFile(`${target}.map`, output.sourceMapText);
            written.push(`${target}.map`);
        }
        return written;
    }
}

/**
 * Transpiles TypeScript sources one file at a time, with the compiler loaded from the first tool
 * path.
 *
 * Settings: `compilerOptions`, in `tsconfig.json` form.
 */
export class TypeScriptPlugin implements ToolPlugin {
    static instance = new TypeScriptPlugin();

    readonly name = "typescript";

    defaultToolPaths(): string[] {
        return [projectRequire().resolve("typescript")];
    }

    async createHandle(toolPaths: string[], settings: ToolOptions): Promise<ToolHandle> {
        const entry = toolPaths.length > 0 ? toolPaths[0] : this.defaultToolPaths()[0];
        const compiler = loadFresh(path.resolve(entry));
        if (!isTypeScriptCompiler(compiler)) {
            throw new Error(`${entry} is not a TypeScript compiler`);
        }

        const jsonOptions = settings.compilerOptions ?? { module: "commonjs", target: "es2019" };
        const converted = compiler.convertCompilerOptionsFromJson(jsonOptions, process.cwd());
        if (converted.errors.length > 0) {
            throw new Error(converted.errors.map(d => formatDiagnostic(compiler, d)).join("\n"));
        }
        log.debug("#createHandle typescript %s from %s", compiler.version, entry);
        return new TranspileHandle(compiler, converted.options, path.resolve(entry));
    }

    releaseHandle(handle: ToolHandle) {
        if (handle instanceof TranspileHandle) {
            unload(handle.entry);
        }
    }
}

plugins.push(TypeScriptPlugin.instance);
