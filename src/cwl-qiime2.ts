#!/usr/bin/env node
/**
 * cwl-qiime2: build a QIIME2 job document and run it with cwl-runner.
 *
 * Usage: cwl-qiime2 -i <input_dir> -c <config.yml> [-o <out_dir>] [-d <level>]
 */
import { exitCodeFor } from "./errors.js";
import { createQiime2Program } from "./qiime2.js";

async function main() {
    await createQiime2Program().parseAsync(process.argv);
}

main()
    .then(() => {
        process.exit(0);
    })
    .catch((err: unknown) => {
        console.error("[cwl-qiime2] Fatal:", err instanceof Error ? err.message : err);
        process.exit(exitCodeFor(err));
    });
