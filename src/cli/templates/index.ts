import { EngineConfig } from "../../schemas/config.js";
import { defaultModelEntries } from "../../catalog/defaults.js";
import { PROVIDER_API_KEYS } from "../../llm/resolve.js";

/**
 * A starter `ideamesh.config.json`: the bundled model catalog plus every
 * setting at its default. Instruction, query and domain catalogs are left
 * out so the bundled ones apply until the user adds their own.
 */
export function templateConfig(): string {
    const config = EngineConfig.parse({ models: defaultModelEntries() });
    return JSON.stringify(config, null, 2) + "\n";
}

export function templateEnv(): string {
    const lines = [
        "# Provider keys. Models whose key is missing run on simulated responses.",
        ...Object.values(PROVIDER_API_KEYS).map((key) => `${key}=`),
        "",
        "# Embedding model for clustering (OpenAI).",
        "# IDEAMESH_EMBEDDING_MODEL=text-embedding-3-small",
    ];
    return lines.join("\n") + "\n";
}
