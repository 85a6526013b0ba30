#!/usr/bin/env node
/**
 * cwl-metacompass: build a MetaCompass job document from read list files
 * and run it with cwl-runner.
 *
 * Usage: cwl-metacompass -c <config.yml> [-p <paired.txt>] [-u <unpaired.txt>] [-o <out_dir>] [-d <level>]
 */
import { exitCodeFor } from "./errors.js";
import { createMetaCompassProgram } from "./metacompass.js";

async function main() {
    await createMetaCompassProgram().parseAsync(process.argv);
}

main()
    .then(() => {
        process.exit(0);
    })
    .catch((err: unknown) => {
        console.error("[cwl-metacompass] Fatal:", err instanceof Error ? err.message : err);
        process.exit(exitCodeFor(err));
    });
