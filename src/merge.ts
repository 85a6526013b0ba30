import { readFileSync } from "node:fs";
import type { CwlClass, CwlConfig, CwlReference, ReadLists } from "./types.js";

function reference(cls: CwlClass, path: string): CwlReference {
    return { class: cls, path };
}

/**
 * Read a list file: one path per line, in file order. Only the line
 * terminator ("\n" or "\r\n") is removed; a trailing newline does not
 * produce an empty entry.
 */
export function readListFile(listPath: string): string[] {
    const content = readFileSync(listPath, "utf-8");
    if (content.length === 0) return [];

    const lines = content.split(/\r?\n/);
    if (content.endsWith("\n")) {
        lines.pop();
    }
    return lines;
}

/** QIIME2: stage the input directory under `staging_dir`. */
export function withStagingDir(config: CwlConfig, inputDir: string): CwlConfig {
    return { ...config, staging_dir: reference("Directory", inputDir) };
}

/**
 * MetaCompass: add `paired_reads` / `unpaired_reads` from the given list
 * files. A list that is not given leaves its key out entirely.
 */
export function withReadLists(config: CwlConfig, lists: ReadLists): CwlConfig {
    const merged: CwlConfig = { ...config };

    if (lists.paired !== undefined) {
        merged.paired_reads = readListFile(lists.paired).map((path) => reference("File", path));
    }
    if (lists.unpaired !== undefined) {
        merged.unpaired_reads = readListFile(lists.unpaired).map((path) => reference("File", path));
    }

    return merged;
}
