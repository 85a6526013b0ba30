import { readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "./logs.js";

const TEMP_PREFIX = "tmp";

export interface DirectoryCleanup {
    /** Remove the engine's temporary directories from `dir`. Never throws. */
    removeTemporaries(dir: string): void;
}

/**
 * Deletes every entry of the directory whose name starts with "tmp",
 * recursively. Failures are logged and otherwise ignored.
 */
export class TempDirCleanup implements DirectoryCleanup {
    constructor(private readonly logger: Logger) {}

    removeTemporaries(dir: string): void {
        let names: string[];
        try {
            names = readdirSync(dir).filter((name) => name.startsWith(TEMP_PREFIX));
        } catch (err) {
            this.logger.warning(`Could not list ${dir} for cleanup:`, err);
            return;
        }

        for (const name of names) {
            const target = join(dir, name);
            try {
                rmSync(target, { recursive: true, force: true });
                this.logger.debug(`Removed ${target}`);
            } catch (err) {
                this.logger.warning(`Could not remove ${target}:`, err);
            }
        }
    }
}
