import { Command, Option } from "commander";
import { TempDirCleanup, type DirectoryCleanup } from "./cleanup.js";
import type { RunEngine } from "./launcher.js";
import { Logger, parseLogLevel, type LogLevel } from "./logs.js";

export const DEFAULT_OUT_DIR = "./cwl_output";
export const DEFAULT_LOG_LEVEL: LogLevel = "error";
export const DEFAULT_RUNNER = "cwl-runner";
export const VERSION = "1.0.0";

/** Collaborators a program can be given in place of the real ones. */
export interface ProgramDeps {
    createLogger?: (level: LogLevel, source: string) => Logger;
    createCleanup?: (logger: Logger) => DirectoryCleanup;
    runEngine?: RunEngine;
    workDir?: string;
}

export interface ResolvedDeps {
    logger: Logger;
    cleanup: DirectoryCleanup;
    runEngine?: RunEngine;
    workDir?: string;
}

/**
 * Options shared by every launcher: config template, output directory,
 * log level, and the engine/workflow overrides.
 */
export function createBaseProgram(name: string, description: string): Command {
    return new Command()
        .name(name)
        .description(description)
        .version(VERSION)
        .requiredOption("-c, --config_file <path>", "YAML job template for the workflow")
        .option("-o, --out_dir <dir>", "directory the workflow engine writes results to", DEFAULT_OUT_DIR)
        .addOption(
            new Option("-d, --debug <level>", "log level: DEBUG, INFO, WARNING, ERROR or CRITICAL")
                .argParser(parseLogLevel)
                .default(DEFAULT_LOG_LEVEL, "ERROR")
        )
        .option("--runner <command>", "workflow engine executable", DEFAULT_RUNNER)
        .option("--workflow <path>", "workflow document to run instead of the bundled one");
}

/** Build the per-run logger and collaborators once, after options are parsed. */
export function resolveDeps(deps: ProgramDeps, level: LogLevel, source: string): ResolvedDeps {
    const logger = deps.createLogger ? deps.createLogger(level, source) : new Logger(level, source);
    const cleanup = deps.createCleanup ? deps.createCleanup(logger) : new TempDirCleanup(logger.child("cleanup"));
    return { logger, cleanup, runEngine: deps.runEngine, workDir: deps.workDir };
}
