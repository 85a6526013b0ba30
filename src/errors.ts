/** The config file parsed, but not into something a job can be built from. */
export class ConfigError extends Error {
    constructor(message: string, readonly path: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export interface CommandFailure {
    command: string;
    exitCode: number | null;
    signal?: NodeJS.Signals | null;
    cause?: Error;
}

/**
 * The workflow engine could not be started, or finished with a non-zero
 * exit status or a signal.
 */
export class CommandExecutionError extends Error {
    readonly command: string;
    readonly exitCode: number | null;
    readonly signal: NodeJS.Signals | null;

    constructor(failure: CommandFailure) {
        super(describeFailure(failure), failure.cause ? { cause: failure.cause } : undefined);
        this.name = "CommandExecutionError";
        this.command = failure.command;
        this.exitCode = failure.exitCode;
        this.signal = failure.signal ?? null;
    }
}

function describeFailure({ command, exitCode, signal, cause }: CommandFailure): string {
    if (cause) {
        return `Command execution failed: could not start "${command}": ${cause.message}`;
    }
    if (signal) {
        return `Command execution failed: "${command}" was killed by ${signal}`;
    }
    return `Command execution failed with exit code ${exitCode}: ${command}`;
}

/**
 * Process exit status for a fatal error: the engine's own code when it
 * reported one, 1 otherwise.
 */
export function exitCodeFor(err: unknown): number {
    if (err instanceof CommandExecutionError && err.exitCode !== null && err.exitCode !== 0) {
        return err.exitCode;
    }
    return 1;
}
