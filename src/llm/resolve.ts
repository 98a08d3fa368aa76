import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";
import type { ProviderName } from "../schemas/catalog.js";

/** Environment variable holding each live provider's API key. */
export const PROVIDER_API_KEYS: Record<Exclude<ProviderName, "simulated">, string> = {
    openai: "OPENAI_API_KEY",
    anthropic: "ANTHROPIC_API_KEY",
    google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

/** True when the provider can be called with the current environment. */
export function hasProviderCredentials(provider: ProviderName): boolean {
    if (provider === "simulated") return false;
    return Boolean(process.env[PROVIDER_API_KEYS[provider]]);
}

/**
 * Resolves a LanguageModel for a provider and provider-side model id.
 * `simulated` models have no live counterpart.
 */
export function resolveLanguageModel(provider: ProviderName, modelId: string): LanguageModel {
    switch (provider) {
        case "openai":
            return openai(modelId);
        case "google":
            return google(modelId);
        case "anthropic":
            return anthropic(modelId);
        case "simulated":
            throw new Error(`Model "${modelId}" is simulated and has no provider client`);
    }
}

/**
 * Guess a provider from a model name. Only used when importing catalogs or
 * session documents written before `provider` was a required field.
 */
export function inferProviderFromName(name: string): ProviderName | undefined {
    const lowered = name.toLowerCase();
    if (lowered.includes("claude")) return "anthropic";
    if (lowered.includes("gpt") || /(^|[^a-z])o[134](-|$)/.test(lowered)) return "openai";
    if (lowered.includes("gemini")) return "google";
    return undefined;
}
