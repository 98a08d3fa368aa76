/**
 * Configuration loading. The engine reads one JSON document parsed through
 * `EngineConfig`; validation problems become ConfigurationError.
 */
import fs from "fs/promises";
import path from "path";
import { EngineConfig } from "../schemas/config.js";
import { ConfigurationError } from "../errors/index.js";

export const DEFAULT_CONFIG_FILE = "ideamesh.config.json";

/** Parse a raw configuration value, reporting the first invalid field. */
export function parseEngineConfig(raw: unknown): EngineConfig {
    const parsed = EngineConfig.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? issue.path.join(".") : "config";
        throw new ConfigurationError(field, issue ? issue.message : "invalid configuration");
    }
    return parsed.data;
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Load `configPath`, or `ideamesh.config.json` in `cwd` when no path is
 * given. Without either, every setting takes its default.
 */
export async function loadEngineConfig(configPath?: string, cwd: string = process.cwd()): Promise<EngineConfig> {
    const target = configPath ? path.resolve(cwd, configPath) : path.join(cwd, DEFAULT_CONFIG_FILE);
    if (!configPath && !(await exists(target))) {
        return parseEngineConfig({});
    }

    let content: string;
    try {
        content = await fs.readFile(target, "utf-8");
    } catch (err) {
        throw new ConfigurationError("config", `cannot read ${target}: ${err instanceof Error ? err.message : String(err)}`);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (err) {
        throw new ConfigurationError("config", `${target} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return parseEngineConfig(raw);
}
