import { readFileSync, writeFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import yaml from "js-yaml";
import { ConfigError } from "./errors.js";
import type { CwlConfig } from "./types.js";

const JOB_FILE_SUFFIX = ".final.yml";

function isMapping(value: unknown): value is CwlConfig {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeDocument(value: unknown): string {
    if (value === null || value === undefined) return "an empty document";
    if (Array.isArray(value)) return "a list";
    return `a ${typeof value}`;
}

/**
 * Load a CWL job template from YAML. Missing files and YAML syntax errors
 * are thrown as-is; the keys themselves are not checked.
 */
export function loadConfig(configPath: string): CwlConfig {
    const resolved = resolve(configPath);
    const content = readFileSync(resolved, "utf-8");
    const raw: unknown = yaml.load(content, { filename: resolved });

    if (!isMapping(raw)) {
        throw new ConfigError(
            `Config file ${resolved} must contain a YAML mapping, got ${describeDocument(raw)}`,
            resolved
        );
    }

    return raw;
}

/**
 * Name of the job document for a config file: "foo/bar.yml" → "bar.final.yml".
 */
export function jobFileName(configPath: string): string {
    const name = basename(configPath);
    return name.slice(0, name.length - extname(name).length) + JOB_FILE_SUFFIX;
}

/**
 * Write the merged job document next to the caller (cwd by default),
 * replacing any previous one. Returns the path written.
 */
export function writeJobFile(
    config: CwlConfig,
    configPath: string,
    dir: string = process.cwd()
): string {
    const target = join(dir, jobFileName(configPath));
    const yamlStr = yaml.dump(config, {
        lineWidth: -1,
        quotingType: '"',
        forceQuotes: false,
    });
    writeFileSync(target, yamlStr, "utf-8");
    return target;
}
