import createDebug from "debug";
import type { Debugger } from "debug";

// tslint:disable:no-console

export interface Logger {
    /** Tracing, visible with `DEBUG=kiln*`. */
    debug: Debugger;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
}

export let quiet = false;

export function setQuiet(value: boolean) {
    quiet = value;
}

/**
 * Logger for one engine component or build step.
 *
 * User facing lines are prefixed with `[scope]`, like task messages.
 */
export function createLogger(scope: string): Logger {
    return {
        debug: createDebug(`kiln:${scope}`),
        info(...args: unknown[]) {
            if (!quiet) {
                console.log(`[${scope}]`, ...args);
            }
        },
        warn(...args: unknown[]) {
            console.warn(`[${scope}]`, ...args);
        }
    };
}
