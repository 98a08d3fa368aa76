/**
 * LLM Client — Thin wrapper around the Vercel AI SDK.
 *
 * The Vercel AI SDK (`ai` package) provides:
 *  - Provider-agnostic model interface (OpenAI, Anthropic, Google)
 *  - Built-in `generateObject()` with native Zod schema validation
 *  - Token usage tracking
 *
 * The SDK's own retries are disabled; the Execution Scheduler owns backoff.
 */
import type { LanguageModel } from "ai";
import { generateObject, generateText } from "ai";
import type { ZodType } from "zod/v4";

/** Options for an LLM generation request. */
export interface GenerateOptions {
    system?: string;
    temperature?: number;
    maxOutputTokens?: number;
    topP?: number;
    abortSignal?: AbortSignal;
}

/** Result of a text generation (free-form). */
export interface TextResult {
    text: string;
    tokenUsage: number;
}

/** Result of a structured object generation (Zod-validated). */
export interface ObjectResult<T> {
    object: T;
    tokenUsage: number;
}

export class LLMClient {
    public readonly model: LanguageModel;

    constructor(model: LanguageModel) {
        this.model = model;
    }

    /**
     * Generate a free-form text response.
     */
    async generateText(prompt: string, options: GenerateOptions = {}): Promise<TextResult> {
        const result = await generateText({
            model: this.model,
            system: options.system,
            prompt,
            temperature: options.temperature,
            maxOutputTokens: options.maxOutputTokens,
            topP: options.topP,
            abortSignal: options.abortSignal,
            maxRetries: 0,
        });

        return {
            text: result.text,
            tokenUsage: result.usage.totalTokens ?? 0,
        };
    }

    /**
     * Generate a structured object validated against a Zod schema.
     */
    async generateObject<T>(
        schema: ZodType<T>,
        prompt: string,
        options: GenerateOptions = {},
    ): Promise<ObjectResult<T>> {
        const result = await generateObject({
            model: this.model,
            schema,
            system: options.system,
            prompt,
            temperature: options.temperature,
            maxOutputTokens: options.maxOutputTokens,
            abortSignal: options.abortSignal,
            maxRetries: 0,
        });

        return {
            object: result.object as T,
            tokenUsage: result.usage.totalTokens ?? 0,
        };
    }
}
