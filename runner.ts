import * as os from "os";

import { KilnProject, ResolvedStep } from "./config/kilnfile";
import { DependencyAggregator } from "./engine/aggregate";
import { DefinitionError, KilnError } from "./engine/errors";
import { listInputFiles } from "./engine/fingerprint";
import { GenerationResult, GenerationStep } from "./engine/generate";
import { createLogger } from "./engine/log";
import { DEFAULT_BUNDLER_DEV_DEPENDENCIES, PackageManifestWriter } from "./engine/manifest";
import { createToolSession, selectToolPlugin } from "./plugins";

const log = createLogger("kiln");

export interface KilnParams {
    watch: boolean;
    /** Keep generating remaining files after one fails. */
    keepGoing: boolean;
    jobsMax: number;
    file: string;
}

export const KILN_DEFAULTS: Readonly<KilnParams> = {
    watch: false,
    keepGoing: true,
    jobsMax: os.cpus().length,
    file: "Kilnfile.json"
};

/**
 * Validates a `--jobs` value.
 */
export function checkJobs(jobs: number): number {
    if (!Number.isInteger(jobs) || jobs < 1) {
        throw new DefinitionError(`--jobs must be a positive integer, got ${jobs}`);
    }
    return jobs;
}

export interface StepRun {
    step: string;
    result?: GenerationResult;
    error?: KilnError;
}

/**
 * Runs a project's steps and manifests.
 *
 * Keeps one tool session per step for its whole lifetime, so watch reruns reuse unchanged tools;
 * `close()` releases them.
 */
export class KilnRunner {
    private readonly steps = new Map<string, GenerationStep>();

    constructor(readonly project: KilnProject, readonly params: KilnParams = KILN_DEFAULTS) {}

    resolveStep(name: string): ResolvedStep {
        const step = this.project.steps.get(name);
        if (step === undefined) {
            throw new DefinitionError(`unknown step ${name}`);
        }
        return step;
    }

    generationStep(name: string): GenerationStep {
        let step = this.steps.get(name);
        if (step === undefined) {
            const definition = this.resolveStep(name);
            const session = createToolSession(selectToolPlugin(definition.tool), definition.settings, name);
            step = new GenerationStep(name, session);
            this.steps.set(name, step);
        }
        return step;
    }

    async runStep(name: string): Promise<GenerationResult> {
        const definition = this.resolveStep(name);
        const step = this.generationStep(name);
        const toolPaths =
            definition.toolPaths.length > 0 ? definition.toolPaths : selectToolPlugin(definition.tool).defaultToolPaths();
        const inputFiles = await listInputFiles(definition.sources, definition.patterns);
        log.debug("#runStep %s: %d input files", name, inputFiles.length);

        return step.run({
            toolPaths,
            inputFiles,
            destinationDir: definition.dest,
            options: {
                ...definition.options,
                policy: definition.options.policy ?? (this.params.keepGoing ? "best-effort" : "fail-fast"),
                jobs: definition.options.jobs ?? this.params.jobsMax
            }
        });
    }

    /**
     * Runs `names` (all steps when empty) one after another.
     *
     * Missing inputs and tool failures end a step; they and per-file failures are reported and
     * the remaining steps still run unless `keepGoing` is off.
     */
    async generate(names: string[] = []): Promise<StepRun[]> {
        const stepNames = names.length > 0 ? names : Array.from(this.project.steps.keys());
        stepNames.forEach(name => this.resolveStep(name));

        const runs: StepRun[] = [];
        for (const name of stepNames) {
            const run = await this.runStepReporting(name);
            runs.push(run);
            if (!succeeded(run) && !this.params.keepGoing) {
                break;
            }
        }
        return runs;
    }

    async runStepReporting(name: string): Promise<StepRun> {
        try {
            const result = await this.runStep(name);
            return { step: name, result };
        } catch (error) {
            if (error instanceof KilnError && !(error instanceof DefinitionError)) {
                log.warn(`${name} failed: ${error.message}`);
                return { step: name, error };
            }
            throw error;
        }
    }

    /**
     * Aggregates each manifest's module and writes it; all manifests share one aggregation pass.
     */
    async writeManifests(names: string[] = []): Promise<Map<string, string[]>> {
        const manifestNames = names.length > 0 ? names : Array.from(this.project.manifests.keys());
        const aggregator = new DependencyAggregator(this.project.graph);
        const written = new Map<string, string[]>();

        for (const name of manifestNames) {
            const manifest = this.project.manifests.get(name);
            if (manifest === undefined) {
                throw new DefinitionError(`unknown manifest ${name}`);
            }
            const result = await aggregator.aggregateModule(manifest.module);
            const devDependencies = manifest.bundlerDevDependencies
                ? { ...DEFAULT_BUNDLER_DEV_DEPENDENCIES, ...manifest.devDependencies }
                : manifest.devDependencies;
            const files = await new PackageManifestWriter(devDependencies).write(result, manifest.dest);
            log.info(`${name}: wrote ${files.length} files to ${manifest.dest}`);
            written.set(name, files);
        }
        return written;
    }

    async close(): Promise<void> {
        for (const step of this.steps.values()) {
            await step.session.close();
        }
    }
}

export function succeeded(run: StepRun): boolean {
    return run.error === undefined && run.result !== undefined && run.result.errors.length === 0 && run.result.skipped.length === 0;
}
