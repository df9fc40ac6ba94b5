import { promises as fs } from "fs";
import * as path from "path";

import { concurrentSettle, createConcurrentRunContext } from "./concurrency";
import { DefinitionError, InvocationError } from "./errors";
import { assertAllExist, InputFile, statInputs } from "./fingerprint";
import { DEFAULT_FORMAT, DEFAULT_FORMAT_RULES, FormatRule, FormatTag, matchFormat } from "./formats";
import { createLogger, Logger } from "./log";
import { CachedSession } from "./session";

export type ToolOptions = Readonly<Record<string, unknown>>;

/**
 * Live binding to one external tool (compiler, formatter, bundler).
 */
export interface ToolHandle {
    /**
     * When not set, a step never runs two invocations of this handle at the same time.
     */
    readonly concurrentSafe?: boolean;

    /**
     * Processes one input file into `outputRoot`.
     *
     * @returns paths of the files written
     */
    invoke(
        inputPath: string,
        inputRoot: string,
        outputRoot: string,
        format: FormatTag,
        options: ToolOptions
    ): Promise<string[]>;
}

/**
 * `best-effort` processes every file and reports all failures; `fail-fast` starts no new files
 * after the first failure.
 */
export type FailurePolicy = "best-effort" | "fail-fast";

export interface GenerationOptions {
    policy?: FailurePolicy;
    /** Parallel invocations, only used for handles that are `concurrentSafe`. */
    jobs?: number;
    formatRules?: readonly FormatRule[];
    /** Report files no format rule matches instead of treating them as `TxtFormat`. */
    strictFormats?: boolean;
    toolOptions?: ToolOptions;
}

export interface GenerationRequest {
    /** Files the tool is loaded from, their fingerprint decides if the session handle is reused. */
    toolPaths: string[];
    inputFiles: InputFile[];
    destinationDir: string;
    options?: GenerationOptions;
}

export interface GenerationResult {
    outputDir: string;
    log: string[];
    outputs: string[];
    errors: InvocationError[];
    /** Inputs not processed because `fail-fast` stopped the step. */
    skipped: InputFile[];
    request: GenerationRequest;
}

export function formatFor(file: InputFile, options: GenerationOptions): FormatTag {
    const fileName = path.basename(file.path);
    const format = matchFormat(fileName, options.formatRules ?? DEFAULT_FORMAT_RULES);
    if (format !== undefined) {
        return format;
    }
    if (options.strictFormats) {
        throw new DefinitionError(`${file.path}: no output format for '${fileName}'`);
    }
    return DEFAULT_FORMAT;
}

/**
 * Runs a session's tool over input files.
 *
 * Missing inputs and tool initialization failures abort the whole run; per-file failures are
 * collected as `InvocationError`s naming the file, so callers can `retry` just those.
 */
export class GenerationStep {
    private readonly log: Logger;

    constructor(readonly name: string, readonly session: CachedSession<ToolHandle>) {
        this.log = createLogger(name);
    }

    async run(request: GenerationRequest): Promise<GenerationResult> {
        const options = request.options ?? {};
        const outputDir = path.resolve(request.destinationDir);
        const lines: string[] = [];
        const note = (line: string) => {
            lines.push(line);
            this.log.info(line);
        };

        assertAllExist(await statInputs(request.inputFiles.map(f => f.path)));
        const handle = await this.session.acquire(request.toolPaths);
        await fs.mkdir(outputDir, { recursive: true });

        const jobs = handle.concurrentSafe ? options.jobs ?? 1 : 1;
        const stopOnError = options.policy === "fail-fast";
        this.log.debug("#run %d files, jobs=%d, policy=%s", request.inputFiles.length, jobs, options.policy);

        const outcomes = await concurrentSettle(
            request.inputFiles,
            createConcurrentRunContext(jobs),
            async file => {
                try {
                    const format = formatFor(file, options);
                    const written = await handle.invoke(file.path, file.root, outputDir, format, options.toolOptions ?? {});
                    note(`${path.relative(file.root, file.path)} (${format}) ok`);
                    return written;
                } catch (error) {
                    const invocationError = new InvocationError(file.path, outputDir, error);
                    note(`failed: ${invocationError.message}`);
                    throw invocationError;
                }
            },
            stopOnError
        );

        const outputs: string[] = [];
        const errors: InvocationError[] = [];
        const skipped: InputFile[] = [];
        outcomes.forEach((outcome, index) => {
            if (outcome === undefined) {
                skipped.push(request.inputFiles[index]);
            } else if (outcome.ok) {
                outputs.push(...outcome.value);
            } else if (outcome.error instanceof InvocationError) {
                errors.push(outcome.error);
            } else {
                errors.push(new InvocationError(request.inputFiles[index].path, outputDir, outcome.error));
            }
        });

        const summary = [`${request.inputFiles.length - errors.length - skipped.length} generated`];
        if (errors.length > 0) {
            summary.push(`${errors.length} failed`);
        }
        if (skipped.length > 0) {
            summary.push(`${skipped.length} skipped`);
        }
        note(summary.join(", "));

        return { outputDir, log: lines, outputs, errors, skipped, request };
    }

    /**
     * Reruns only the files that failed or were skipped in `previous`.
     */
    retry(previous: GenerationResult): Promise<GenerationResult> {
        const failedPaths = new Set(previous.errors.map(e => e.inputPath));
        const inputFiles = [
            ...previous.request.inputFiles.filter(f => failedPaths.has(f.path)),
            ...previous.skipped
        ];
        return this.run({ ...previous.request, inputFiles });
    }
}
