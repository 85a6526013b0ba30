import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { TempDirCleanup } from "../src/cleanup.js";
import { Logger, type LogEntry } from "../src/logs.js";

describe("TempDirCleanup", () => {
    let workDir: string;

    afterEach(() => {
        if (workDir) {
            rmSync(workDir, { recursive: true, force: true });
        }
    });

    it("removes every entry whose name starts with tmp", () => {
        workDir = mkdtempSync(join(tmpdir(), "cwl-launch-cleanup-test-"));
        mkdirSync(join(workDir, "tmpa1b2", "nested"), { recursive: true });
        writeFileSync(join(workDir, "tmpa1b2", "nested", "part.bam"), "x");
        mkdirSync(join(workDir, "tmp_out9z"));
        writeFileSync(join(workDir, "tmp.log"), "x");
        writeFileSync(join(workDir, "config.final.yml"), "x");
        mkdirSync(join(workDir, "cwl_output"));

        new TempDirCleanup(new Logger("critical")).removeTemporaries(workDir);

        expect(readdirSync(workDir).sort()).toEqual(["config.final.yml", "cwl_output"]);
    });

    it("logs a warning instead of throwing when the directory is missing", () => {
        workDir = mkdtempSync(join(tmpdir(), "cwl-launch-cleanup-test-"));
        const entries: LogEntry[] = [];
        const cleanup = new TempDirCleanup(new Logger("debug", "cleanup", (e) => entries.push(e)));

        expect(() => cleanup.removeTemporaries(join(workDir, "gone"))).not.toThrow();
        expect(entries).toHaveLength(1);
        expect(entries[0].level).toBe("warning");
        expect(entries[0].message.startsWith(`Could not list ${join(workDir, "gone")} for cleanup:`)).toBe(true);
    });
});
