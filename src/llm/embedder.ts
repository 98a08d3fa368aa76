/**
 * Embedder — text → vector capability used by the Cluster Analyzer.
 */
import { embedMany } from "ai";
import type { EmbeddingModel } from "ai";
import { openai } from "@ai-sdk/openai";

export interface Embedder {
    embedMany(texts: readonly string[]): Promise<number[][]>;
}

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export class AiSdkEmbedder implements Embedder {
    private readonly model: EmbeddingModel<string>;

    constructor(model: EmbeddingModel<string> = openai.embedding(DEFAULT_EMBEDDING_MODEL)) {
        this.model = model;
    }

    async embedMany(texts: readonly string[]): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.model,
            values: [...texts],
            maxRetries: 0,
        });
        return embeddings;
    }
}
