import * as ChildProcess from "child_process";
import { constants as fsConstants, promises as fs } from "fs";
import * as path from "path";

import { ToolHandle, ToolOptions } from "../engine/generate";
import { FormatTag } from "../engine/formats";
import { createLogger } from "../engine/log";
import { plugins, ToolPlugin } from "./protocol";

const log = createLogger("shell");

export interface ProcessResult {
    exitCode: number;
    capturedOutput: string[];
}

/**
 * Runs `command` without a shell, capturing stdout and stderr interleaved.
 */
export function captureCommand(command: string, args: string[], options: ChildProcess.SpawnOptions): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
        const capturedOutput: string[] = [];
        log.debug(`spawning: ${command} ${args.join(" ")}`);
        const subProcess = ChildProcess.spawn(command, args, { ...options, stdio: ["ignore", "pipe", "pipe"] });

        function captureOutput(data: Buffer) {
            capturedOutput.push(String(data));
        }
        subProcess.stdout?.on("data", captureOutput);
        subProcess.stderr?.on("data", captureOutput);
        subProcess.on("error", err => {
            reject(new Error(`command failed: error spawning process: ${err.message}`));
        });
        subProcess.on("close", code => {
            resolve({ exitCode: code ?? 1, capturedOutput });
        });
    });
}

export function* processOutputLines(processOutput: string[]): Generator<string> {
    const text = processOutput.join("");
    for (const line of text.split("\n")) {
        if (line !== "") {
            yield line;
        }
    }
}

export interface ShellSettings {
    /** Arguments, `{input}`, `{inputRoot}`, `{output}`, `{outputRoot}` and `{format}` are substituted. */
    args: string[];
    /** Set when the tool can run several times at once. */
    concurrent: boolean;
}

export function parseShellSettings(settings: ToolOptions): ShellSettings {
    const args = settings.args ?? [];
    if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === "string")) {
        throw new Error(`shell: 'args' must be a list of strings`);
    }
    return { args, concurrent: settings.concurrent === true };
}

export function substituteArgs(args: string[], values: Record<string, string>): string[] {
    return args.map(arg =>
        arg.replace(/\{(\w+)\}/g, (match: string, key: string) =>
            Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
        )
    );
}

class CommandHandle implements ToolHandle {
    constructor(readonly executable: string, readonly settings: ShellSettings) {}

    get concurrentSafe(): boolean {
        return this.settings.concurrent;
    }

    async invoke(inputPath: string, inputRoot: string, outputRoot: string, format: FormatTag): Promise<string[]> {
        const output = path.join(outputRoot, path.relative(inputRoot, inputPath));
        await fs.mkdir(path.dirname(output), { recursive: true });

        const args = substituteArgs(this.settings.args, {
            input: inputPath,
            inputRoot,
            output,
            outputRoot,
            format
        });
        const result = await captureCommand(this.executable, args, { cwd: inputRoot });
        if (result.exitCode !== 0) {
            const commandStr = [this.executable, ...args].join(" ");
            const outputText = Array.from(processOutputLines(result.capturedOutput)).join("\n");
            throw new Error(`command '${commandStr}' failed (exit code ${result.exitCode})${outputText ? `:\n${outputText}` : ""}`);
        }
        for (const line of processOutputLines(result.capturedOutput)) {
            log.debug("%s: %s", path.basename(inputPath), line);
        }

        try {
            await fs.access(output);
            return [output];
        } catch {
            // formatters checking or rewriting sources in place produce nothing here
            return [];
        }
    }
}

/**
 * Runs an external executable (formatter, bundler) once per input file.
 *
 * The first tool path is the executable; settings: `args`, `concurrent`.
 */
export class ShellPlugin implements ToolPlugin {
    static instance = new ShellPlugin();

    readonly name = "shell";

    defaultToolPaths(): string[] {
        return [];
    }

    async createHandle(toolPaths: string[], settings: ToolOptions): Promise<ToolHandle> {
        if (toolPaths.length === 0) {
            throw new Error("shell: no executable given");
        }
        const executable = path.resolve(toolPaths[0]);
        const stats = await fs.stat(executable);
        if (!stats.isFile()) {
            throw new Error(`${executable} is not a file`);
        }
        await fs.access(executable, fsConstants.X_OK);
        return new CommandHandle(executable, parseShellSettings(settings));
    }
}

plugins.push(ShellPlugin.instance);
