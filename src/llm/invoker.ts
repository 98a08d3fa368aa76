/**
 * Model Invoker — the capability the Execution Scheduler calls to turn a
 * prompt into text. `AiSdkModelInvoker` is the live implementation; tests
 * supply their own.
 */
import type { LanguageModel } from "ai";
import type { ModelDescriptor, ProviderName } from "../schemas/catalog.js";
import { LLMClient } from "./client.js";
import { hasProviderCredentials, resolveLanguageModel } from "./resolve.js";

export interface InvocationResponse {
    text: string;
    success: boolean;
    error?: string;
}

export interface ModelInvoker {
    /** False when the model's provider cannot be reached; the scheduler simulates instead. */
    isAvailable(model: ModelDescriptor): boolean;
    invoke(model: ModelDescriptor, prompt: string): Promise<InvocationResponse>;
}

export interface AiSdkModelInvokerOptions {
    resolveModel?: (provider: ProviderName, modelId: string) => LanguageModel;
    hasCredentials?: (provider: ProviderName) => boolean;
}

export class AiSdkModelInvoker implements ModelInvoker {
    private readonly resolveModel: (provider: ProviderName, modelId: string) => LanguageModel;
    private readonly hasCredentials: (provider: ProviderName) => boolean;
    private readonly clients = new Map<string, LLMClient>();

    constructor(options: AiSdkModelInvokerOptions = {}) {
        this.resolveModel = options.resolveModel ?? resolveLanguageModel;
        this.hasCredentials = options.hasCredentials ?? hasProviderCredentials;
    }

    isAvailable(model: ModelDescriptor): boolean {
        return model.provider !== "simulated" && this.hasCredentials(model.provider);
    }

    async invoke(model: ModelDescriptor, prompt: string): Promise<InvocationResponse> {
        const result = await this.clientFor(model).generateText(prompt, {
            temperature: model.parameters.temperature,
            maxOutputTokens: model.parameters.max_tokens,
            topP: model.parameters.top_p,
        });
        if (result.text.trim().length === 0) {
            return { text: "", success: false, error: "model returned an empty response" };
        }
        return { text: result.text, success: true };
    }

    private clientFor(model: ModelDescriptor): LLMClient {
        const key = `${model.provider}:${model.model}`;
        let client = this.clients.get(key);
        if (!client) {
            client = new LLMClient(this.resolveModel(model.provider, model.model));
            this.clients.set(key, client);
        }
        return client;
    }
}
