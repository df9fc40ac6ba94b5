//
// Error taxonomy shared by sessions, generation steps and aggregation.
//
// Every error names the file or module it is about; the original failure, when there is one, is
// kept on `cause`.
//

export class KilnError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "KilnError";
    }
}

/**
 * Invalid build definition: unknown module or tool, malformed Kilnfile.
 */
export class DefinitionError extends KilnError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "DefinitionError";
    }
}

export class InputNotFoundError extends KilnError {
    constructor(readonly paths: string[]) {
        super(`input not found: ${paths.join(", ")}`);
        this.name = "InputNotFoundError";
    }
}

export class SessionInitError extends KilnError {
    constructor(readonly session: string, readonly inputs: string[], cause: unknown) {
        super(`${session}: failed to initialize tool from [${inputs.join(", ")}]: ${describeError(cause)}`, {
            cause
        });
        this.name = "SessionInitError";
    }
}

export class InvocationError extends KilnError {
    constructor(readonly inputPath: string, readonly destinationDir: string, cause: unknown) {
        super(`${inputPath}: failed to generate into ${destinationDir}: ${describeError(cause)}`, { cause });
        this.name = "InvocationError";
    }
}

export class CyclicDependencyError extends KilnError {
    /**
     * @param cycle module ids along the cycle, first id repeated at the end
     */
    constructor(readonly cycle: string[]) {
        super(`cyclic module dependency: ${cycle.join(" -> ")}`);
        this.name = "CyclicDependencyError";
    }
}

/**
 * Non-fatal: two fragments share an identifier and the later one replaced the earlier one.
 *
 * Never thrown, handed to `onWarning` callbacks instead.
 */
export class IdentifierCollisionWarning extends KilnError {
    constructor(readonly id: string, readonly previousOwner: string, readonly nextOwner: string) {
        super(`fragment '${id}' from ${previousOwner} overwritten by ${nextOwner}`);
        this.name = "IdentifierCollisionWarning";
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
