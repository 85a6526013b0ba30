import type { Command } from "commander";
import { createBaseProgram, resolveDeps, type ProgramDeps } from "./cli.js";
import { launch } from "./launcher.js";
import { withStagingDir } from "./merge.js";
import { workflowPath } from "./runner.js";
import type { Qiime2Options } from "./types.js";

export const QIIME2_WORKFLOW = "qiime2-workflow.cwl";

/**
 * cwl-qiime2: stage an input directory into the job template and run the
 * QIIME2 workflow on it.
 */
export function createQiime2Program(deps: ProgramDeps = {}): Command {
    const program = createBaseProgram(
        "cwl-qiime2",
        "Build a QIIME2 CWL job from a config template and run it with the workflow engine"
    ).requiredOption("-i, --input_dir <dir>", "directory holding the input reads");

    program.action(async () => {
        const options = program.opts<Qiime2Options>();
        const resolved = resolveDeps(deps, options.debug, "cwl-qiime2");

        await launch(
            {
                configFile: options.config_file,
                outDir: options.out_dir,
                runner: options.runner,
                workflow: options.workflow ?? workflowPath(QIIME2_WORKFLOW),
                merge: (config) => withStagingDir(config, options.input_dir),
            },
            resolved
        );
    });

    return program;
}
