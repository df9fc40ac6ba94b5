import * as chokidar from "chokidar";
import * as _ from "lodash";
import * as path from "path";

import { createLogger } from "./engine/log";
import { KilnRunner, succeeded } from "./runner";

const log = createLogger("watch");

function isInside(filePath: string, root: string): boolean {
    const relative = path.relative(root, filePath);
    return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Maps file changes to the steps reading those files and triggers their rerun, debounced.
 */
export class WatchManager {
    private watcher: chokidar.FSWatcher | undefined;
    private watchedSteps = new Map<string, string[]>();
    private markedSteps = new Set<string>();
    private closed = false;
    private nextStepTriggerDebounced: _.DebouncedFunc<() => void>;
    private debouncedLogMarkedRebuild = _.debounce(() => {
        if (this.markedSteps.size === 0) {
            return;
        }
        log.info(`files changed, will rebuild: ${Array.from(this.markedSteps).join(", ")}`);
    });

    constructor(readonly runner: KilnRunner, readonly nextStepTrigger: () => void, wait: number = 100) {
        this.nextStepTriggerDebounced = _.debounce(nextStepTrigger, wait);
    }

    registerStep(name: string) {
        const definition = this.runner.resolveStep(name);
        const paths = [...definition.sources, ...definition.toolPaths];
        this.watchedSteps.set(name, paths);
        if (this.watcher === undefined) {
            this.watcher = chokidar.watch(paths, { ignoreInitial: true, disableGlobbing: true });
            this.watcher.on("add", this.onFileChanged);
            this.watcher.on("change", this.onFileChanged);
            this.watcher.on("unlink", this.onFileChanged);
        } else {
            this.watcher.add(paths);
        }
    }

    consumePendingTriggers(): string[] {
        const r = Array.from(this.markedSteps);
        this.markedSteps = new Set();
        return r;
    }

    async close() {
        this.closed = true;
        this.debouncedLogMarkedRebuild.cancel();
        this.nextStepTriggerDebounced.cancel();
        if (this.watcher !== undefined) {
            await this.watcher.close();
            this.watcher = undefined;
        }
    }

    onFileChanged = (filePath: string) => {
        const absPath = path.resolve(filePath);
        const affected = Array.from(this.watchedSteps)
            .filter(([, roots]) => roots.some(root => isInside(absPath, root)))
            .map(([name]) => name);
        log.debug("#onFileChanged %s => %o", absPath, affected);
        if (this.closed || affected.length === 0) {
            return;
        }
        affected.forEach(name => this.markedSteps.add(name));
        this.debouncedLogMarkedRebuild();
        this.nextStepTriggerDebounced();
    };
}

/**
 * Runs `names` once, then again whenever their inputs change, until `shutdown` resolves.
 */
export async function watchSteps(runner: KilnRunner, names: string[], shutdown: Promise<void>): Promise<void> {
    const stepNames = names.length > 0 ? names : Array.from(runner.project.steps.keys());
    let running: Promise<void> = Promise.resolve();
    let rerunRequested = false;
    let stopping = false;

    async function rebuild(steps: string[]) {
        for (const name of steps) {
            const run = await runner.runStepReporting(name);
            if (!succeeded(run)) {
                log.warn(`${name}: failed, waiting for changes`);
            }
        }
        log.info("(watching for changes)");
    }

    function reportFailure(error: unknown) {
        log.warn("rebuild failed:", error);
    }

    function trigger() {
        if (stopping || rerunRequested) {
            return;
        }
        rerunRequested = true;
        running = running
            .then(() => {
                rerunRequested = false;
                return rebuild(watcher.consumePendingTriggers());
            })
            .catch(reportFailure);
    }

    const watcher = new WatchManager(runner, trigger);
    stepNames.forEach(name => watcher.registerStep(name));

    running = rebuild(stepNames).catch(reportFailure);
    await shutdown;
    stopping = true;
    await watcher.close();
    await running;
}

/**
 * `watchSteps` until SIGINT or SIGTERM; the signal handlers are removed again afterwards.
 */
export async function watchUntilSignal(runner: KilnRunner, names: string[]): Promise<void> {
    let requestShutdown: () => void = () => undefined;
    const shutdown = new Promise<void>(resolve => {
        requestShutdown = resolve;
    });
    const onSignal = () => requestShutdown();
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
    try {
        await watchSteps(runner, names, shutdown);
    } finally {
        process.off("SIGTERM", onSignal);
        process.off("SIGINT", onSignal);
    }
}
