import type { Command } from "commander";
import { createBaseProgram, resolveDeps, type ProgramDeps } from "./cli.js";
import { launch } from "./launcher.js";
import { withReadLists } from "./merge.js";
import { workflowPath } from "./runner.js";
import type { MetaCompassOptions } from "./types.js";

export const METACOMPASS_WORKFLOW = "metacompass-workflow.cwl";

/**
 * cwl-metacompass: turn paired/unpaired read list files into CWL File
 * arrays and run the MetaCompass workflow.
 */
export function createMetaCompassProgram(deps: ProgramDeps = {}): Command {
    const program = createBaseProgram(
        "cwl-metacompass",
        "Build a MetaCompass CWL job from a config template and run it with the workflow engine"
    )
        .option("-p, --paired_file_list <path>", "text file listing paired read files, one per line")
        .option("-u, --unpaired_file_list <path>", "text file listing unpaired read files, one per line");

    program.action(async () => {
        const options = program.opts<MetaCompassOptions>();
        const resolved = resolveDeps(deps, options.debug, "cwl-metacompass");

        if (options.paired_file_list === undefined && options.unpaired_file_list === undefined) {
            resolved.logger.warning("No paired or unpaired file list given; the job has no reads");
        }

        await launch(
            {
                configFile: options.config_file,
                outDir: options.out_dir,
                runner: options.runner,
                workflow: options.workflow ?? workflowPath(METACOMPASS_WORKFLOW),
                merge: (config) =>
                    withReadLists(config, {
                        paired: options.paired_file_list,
                        unpaired: options.unpaired_file_list,
                    }),
            },
            resolved
        );
    });

    return program;
}
