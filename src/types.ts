import type { LogLevel } from "./logs.js";

// ── Shared types for cwl-launch ──

/** A CWL job mapping as loaded from YAML. Keys come from the workflow's input schema. */
export type CwlConfig = Record<string, unknown>;

export type CwlClass = "File" | "Directory";

export interface CwlReference {
    class: CwlClass;
    path: string;
}

export interface ReadLists {
    paired?: string;
    unpaired?: string;
}

// ── Runner types ──

export interface RunnerCommand {
    command: string;
    args: string[];
}

export interface RunnerCommandOptions {
    runner: string;
    outDir: string;
    workflow: string;
    jobFile: string;
}

// ── CLI option types ──

export type CommonOptions = {
    config_file: string;
    out_dir: string;
    debug: LogLevel;
    runner: string;
    workflow?: string;
};

export type Qiime2Options = CommonOptions & {
    input_dir: string;
};

export type MetaCompassOptions = CommonOptions & {
    paired_file_list?: string;
    unpaired_file_list?: string;
};
