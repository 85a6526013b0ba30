import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { Logger, parseLogLevel, type LogEntry } from "../src/logs.js";

function collect(): { entries: LogEntry[]; sink: (entry: LogEntry) => void } {
    const entries: LogEntry[] = [];
    return { entries, sink: (entry) => entries.push(entry) };
}

describe("parseLogLevel", () => {
    it("accepts level names in any case", () => {
        expect(parseLogLevel("DEBUG")).toBe("debug");
        expect(parseLogLevel("info")).toBe("info");
        expect(parseLogLevel("Error")).toBe("error");
    });

    it("maps aliases", () => {
        expect(parseLogLevel("WARN")).toBe("warning");
        expect(parseLogLevel("FATAL")).toBe("critical");
    });

    it("rejects unknown names", () => {
        expect(() => parseLogLevel("bogus")).toThrow(InvalidArgumentError);
        expect(() => parseLogLevel("bogus")).toThrow("Invalid log level: bogus");
    });
});

describe("Logger", () => {
    it("drops messages below its level", () => {
        const { entries, sink } = collect();
        const logger = new Logger("warning", "test", sink);

        logger.debug("d");
        logger.info("i");
        logger.warning("w");
        logger.critical("c");

        expect(entries.map((e) => e.level)).toEqual(["warning", "critical"]);
    });

    it("formats arguments and tags the source", () => {
        const { entries, sink } = collect();
        const logger = new Logger("error", "cwl-qiime2", sink);

        logger.error("exit %d from %s", 3, "cwl-runner");

        expect(entries).toHaveLength(1);
        expect(entries[0].message).toBe("exit 3 from cwl-runner");
        expect(entries[0].source).toBe("cwl-qiime2");
        expect(entries[0].level).toBe("error");
    });

    it("creates children with the same threshold and sink", () => {
        const { entries, sink } = collect();
        const child = new Logger("info", "parent", sink).child("cleanup");

        child.debug("hidden");
        child.info("shown");

        expect(child.level).toBe("info");
        expect(entries).toHaveLength(1);
        expect(entries[0].source).toBe("cleanup");
    });
});
