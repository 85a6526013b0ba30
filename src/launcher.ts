import { loadConfig, writeJobFile } from "./config.js";
import type { DirectoryCleanup } from "./cleanup.js";
import type { Logger } from "./logs.js";
import { buildRunnerCommand, runWorkflow } from "./runner.js";
import type { CwlConfig, RunnerCommand } from "./types.js";

export type RunEngine = (command: RunnerCommand, logger: Logger) => Promise<void>;

export interface LaunchRequest {
    configFile: string;
    outDir: string;
    runner: string;
    workflow: string;
    /** Adds the program's input references to the loaded template. */
    merge: (config: CwlConfig) => CwlConfig;
}

export interface LaunchDeps {
    logger: Logger;
    cleanup: DirectoryCleanup;
    /** Where the job document is written and temporaries are removed. Defaults to cwd. */
    workDir?: string;
    runEngine?: RunEngine;
}

/**
 * Load → merge → write job → run engine → clean up. The first failure
 * aborts the rest, cleanup included. Resolves with the job file path.
 */
export async function launch(request: LaunchRequest, deps: LaunchDeps): Promise<string> {
    const { logger, cleanup } = deps;
    const workDir = deps.workDir ?? process.cwd();
    const runEngine = deps.runEngine ?? runWorkflow;

    logger.info(`Loading config ${request.configFile}`);
    const template = loadConfig(request.configFile);

    const job = request.merge(template);
    logger.debug("Merged job inputs:", job);

    const jobFile = writeJobFile(job, request.configFile, workDir);
    logger.info(`Wrote job document ${jobFile}`);

    await runEngine(
        buildRunnerCommand({
            runner: request.runner,
            outDir: request.outDir,
            workflow: request.workflow,
            jobFile,
        }),
        logger
    );

    cleanup.removeTemporaries(workDir);
    return jobFile;
}
