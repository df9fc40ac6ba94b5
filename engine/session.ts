import { SessionInitError } from "./errors";
import { Fingerprint, fingerprint } from "./fingerprint";
import { createLogger, Logger } from "./log";

/**
 * Builds a handle to an external tool from the files it is loaded from (compiler classpath, helper
 * modules, executable).
 */
export type HandleFactory<H> = (inputs: string[], fingerprint: Fingerprint) => Promise<H>;

/**
 * Frees whatever a handle holds. Called once per handle, when it is replaced or the session is
 * closed.
 */
export type HandleRelease<H> = (handle: H) => void | Promise<void>;

export interface CachedSessionOptions<H> {
    /** Used in log lines and errors. */
    name: string;
    create: HandleFactory<H>;
    release?: HandleRelease<H>;
}

export interface SessionStats {
    constructions: number;
    releases: number;
    hits: number;
}

interface Populated<H> {
    fingerprint: Fingerprint;
    handle: H;
}

interface PendingConstruction<H> {
    fingerprint: Fingerprint;
    promise: Promise<H>;
}

/**
 * At most one live handle, rebuilt only when the fingerprint of its inputs changes.
 *
 * Lifetime is the caller's: create one session per tool binding, pass it to the steps using it and
 * `close()` it when done.
 *
 * Constructions are serialized: a `get` with a new fingerprint waits for a construction in flight,
 * and calls asking for the fingerprint being built share its result. A failed construction leaves
 * the previous handle in place.
 */
export class CachedSession<H> {
    readonly name: string;
    readonly stats: SessionStats = { constructions: 0, releases: 0, hits: 0 };

    private current: Populated<H> | undefined;
    private pending: PendingConstruction<H> | undefined;
    private readonly log: Logger;

    constructor(private readonly options: CachedSessionOptions<H>) {
        this.name = options.name;
        this.log = createLogger(`session:${options.name}`);
    }

    get fingerprint(): Fingerprint | undefined {
        return this.current?.fingerprint;
    }

    get populated(): boolean {
        return this.current !== undefined;
    }

    /**
     * Fingerprints `inputs` and returns the matching handle.
     */
    async acquire(inputs: string[]): Promise<H> {
        return this.get(await fingerprint(inputs), inputs);
    }

    get(newFingerprint: Fingerprint, inputs: string[]): Promise<H> {
        const current = this.current;
        if (current !== undefined && current.fingerprint === newFingerprint) {
            this.stats.hits += 1;
            return Promise.resolve(current.handle);
        }
        const pending = this.pending;
        if (pending !== undefined && pending.fingerprint === newFingerprint) {
            this.log.debug("#get joining construction in flight");
            return pending.promise;
        }

        const previous = pending !== undefined ? pending.promise.then(noop, noop) : Promise.resolve();
        const promise = previous.then(() => this.rebuild(newFingerprint, inputs));
        const construction = { fingerprint: newFingerprint, promise };
        this.pending = construction;

        const clearPending = () => {
            if (this.pending === construction) {
                this.pending = undefined;
            }
        };
        void promise.then(clearPending, clearPending);
        return promise;
    }

    /**
     * Releases the current handle; the next `get` constructs a new one.
     */
    async close(): Promise<void> {
        const pending = this.pending;
        if (pending !== undefined) {
            await pending.promise.then(noop, noop);
        }
        const current = this.current;
        this.current = undefined;
        if (current !== undefined) {
            await this.releaseHandle(current.handle);
        }
    }

    private async rebuild(newFingerprint: Fingerprint, inputs: string[]): Promise<H> {
        // An earlier construction we waited for may have produced exactly this.
        const current = this.current;
        if (current !== undefined && current.fingerprint === newFingerprint) {
            this.stats.hits += 1;
            return current.handle;
        }

        this.log.debug("#rebuild %s => %s", current?.fingerprint.substring(0, 12), newFingerprint.substring(0, 12));
        let handle: H;
        try {
            handle = await this.options.create(inputs, newFingerprint);
        } catch (error) {
            throw new SessionInitError(this.name, inputs, error);
        }
        this.stats.constructions += 1;
        this.current = { fingerprint: newFingerprint, handle };

        if (current !== undefined) {
            await this.releaseHandle(current.handle);
        }
        return handle;
    }

    private async releaseHandle(handle: H) {
        this.stats.releases += 1;
        if (this.options.release === undefined) {
            return;
        }
        try {
            await this.options.release(handle);
        } catch (error) {
            this.log.warn("failed to release tool handle:", error);
        }
    }
}

function noop() {
    /* */
}
