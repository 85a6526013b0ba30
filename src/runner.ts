import { spawn, type ChildProcess } from "node:child_process";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { CommandExecutionError } from "./errors.js";
import type { Logger } from "./logs.js";
import type { RunnerCommand, RunnerCommandOptions } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Workflow documents ship with the package, one level above src/ and dist/. */
export const WORKFLOW_DIR = join(__dirname, "..", "cwl", "workflows");

export const TMP_OUTDIR_PREFIX = "tmp_out";
export const TMPDIR_PREFIX = "./tmp";

export type SpawnProcess = (command: string, args: string[]) => ChildProcess;

export interface RunWorkflowOptions {
    spawnProcess?: SpawnProcess;
    /** Receives each output line of the engine, without its terminator. */
    writeLine?: (line: string) => void;
}

const defaultSpawn: SpawnProcess = (command, args) =>
    spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

const defaultWriteLine = (line: string): void => {
    process.stdout.write(`${line}\n`);
};

export function workflowPath(name: string): string {
    return join(WORKFLOW_DIR, name);
}

/**
 * cwl-runner --tmp-outdir-prefix=tmp_out --tmpdir-prefix=./tmp --outdir=<out> <workflow> <job>
 */
export function buildRunnerCommand(options: RunnerCommandOptions): RunnerCommand {
    return {
        command: options.runner,
        args: [
            `--tmp-outdir-prefix=${TMP_OUTDIR_PREFIX}`,
            `--tmpdir-prefix=${TMPDIR_PREFIX}`,
            `--outdir=${options.outDir}`,
            options.workflow,
            options.jobFile,
        ],
    };
}

export function formatCommand({ command, args }: RunnerCommand): string {
    return [command, ...args].join(" ");
}

/**
 * Split a stream into lines and hand each one on as soon as it is complete.
 * A last line without a terminator is flushed when the stream ends.
 */
function forwardLines(
    stream: NodeJS.ReadableStream | null,
    writeLine: (line: string) => void
): void {
    if (!stream) return;
    let buffer = "";
    // Decoder keeps multi-byte characters split across chunks intact.
    stream.setEncoding("utf8");

    stream.on("data", (chunk: string) => {
        buffer += chunk;

        let newlineIndex = buffer.indexOf("\n");
        while (newlineIndex >= 0) {
            writeLine(buffer.slice(0, newlineIndex).replace(/\r$/, ""));
            buffer = buffer.slice(newlineIndex + 1);
            newlineIndex = buffer.indexOf("\n");
        }
    });

    stream.on("end", () => {
        if (buffer.length > 0) {
            writeLine(buffer.replace(/\r$/, ""));
            buffer = "";
        }
    });
}

/**
 * Run the workflow engine to completion. Its stdout and stderr are both
 * forwarded line by line to our stdout; the exit status is checked only
 * after the process has closed.
 */
export function runWorkflow(
    runnerCommand: RunnerCommand,
    logger: Logger,
    options: RunWorkflowOptions = {}
): Promise<void> {
    const spawnProcess = options.spawnProcess ?? defaultSpawn;
    const writeLine = options.writeLine ?? defaultWriteLine;
    const commandLine = formatCommand(runnerCommand);

    logger.info(`Running: ${commandLine}`);

    return new Promise((resolve, reject) => {
        const child = spawnProcess(runnerCommand.command, runnerCommand.args);

        forwardLines(child.stdout, writeLine);
        forwardLines(child.stderr, writeLine);

        let spawnFailed = false;

        child.on("error", (err) => {
            spawnFailed = true;
            reject(new CommandExecutionError({ command: commandLine, exitCode: null, cause: err }));
        });

        child.on("close", (code, signal) => {
            if (spawnFailed) return;
            if (code === 0) {
                logger.info("Workflow engine finished successfully");
                resolve();
                return;
            }
            logger.error(`Workflow engine exited with ${signal ?? `code ${code}`}`);
            reject(new CommandExecutionError({ command: commandLine, exitCode: code, signal }));
        });
    });
}
