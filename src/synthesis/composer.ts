/**
 * Idea composers. `ExtractiveComposer` assembles ideas from the sources'
 * own sentences and is fully deterministic; `ModelComposer` asks a language
 * model to write the idea.
 */
import { z } from "zod/v4";
import type { LLMClient } from "../llm/client.js";
import { contentTokens, splitSentences, titleCase } from "../evaluation/text.js";
import type { ComposeRequest, ComposedIdea, IdeaComposer, SourceResult } from "./types.js";

const KEY_SENTENCES_PER_SOURCE = 2;
const TITLE_MAX_LENGTH = 80;

/**
 * The sentences carrying the most distinct content words, in the order they
 * appear in the text.
 */
export function keySentences(text: string, count: number = KEY_SENTENCES_PER_SOURCE): string[] {
    const sentences = splitSentences(text).map((sentence, position) => ({
        sentence,
        position,
        weight: new Set(contentTokens(sentence)).size,
    }));
    return sentences
        .filter((entry) => entry.weight > 0)
        .sort((a, b) => b.weight - a.weight || a.position - b.position)
        .slice(0, count)
        .sort((a, b) => a.position - b.position)
        .map((entry) => entry.sentence);
}

/** First line of a text that reads like a heading. */
function headline(text: string): string | undefined {
    return text
        .split("\n")
        .map((line) => line.replace(/^[#*\-\s]+/, "").trim())
        .find((line) => line.length > 5 && line.length < TITLE_MAX_LENGTH);
}

function uniqueSentences(sources: readonly SourceResult[], seen: Set<string>): { source: SourceResult; sentence: string }[] {
    const picked: { source: SourceResult; sentence: string }[] = [];
    for (const source of sources) {
        for (const sentence of keySentences(source.result.text)) {
            const key = sentence.toLowerCase();
            if (seen.has(key)) continue;
            seen.add(key);
            picked.push({ source, sentence });
        }
    }
    return picked;
}

export class ExtractiveComposer implements IdeaComposer {
    async compose(request: ComposeRequest): Promise<ComposedIdea> {
        switch (request.method) {
            case "cluster_based":
                return this.clusterIdea(request);
            case "cross_pollination":
                return this.crossIdea(request);
            case "refinement":
                return this.refinedIdea(request);
        }
    }

    private clusterIdea(request: ComposeRequest): ComposedIdea {
        const label = request.labels[0];
        const title = label
            ? titleCase(label)
            : headline(request.sources[0]?.result.text ?? "") ?? "Synthesized Idea";
        const points = uniqueSentences(request.sources, new Set());
        const lines = [
            `Synthesis of ${request.sources.length} related responses${label ? ` on "${label}"` : ""}.`,
            "",
            ...points.map((point) => `- ${point.sentence}`),
        ];
        return { title, text: lines.join("\n") };
    }

    private crossIdea(request: ComposeRequest): ComposedIdea {
        const labels = request.labels.filter((label) => label.length > 0);
        const title = labels.length > 0
            ? `Cross-Pollination: ${labels.map(titleCase).join(" × ")}`
            : "Cross-Pollinated Innovation";
        const models = new Set(request.sources.map((source) => source.modelId));
        const points = uniqueSentences(request.sources, new Set());
        const lines = [
            `Combines ${request.sources.length} perspectives from ${models.size} models.`,
            "",
            ...points.map((point) => `- From ${point.source.modelId}: ${point.sentence}`),
        ];
        return { title, text: lines.join("\n") };
    }

    private refinedIdea(request: ComposeRequest): ComposedIdea {
        const best = request.sources[0];
        if (!request.draft) {
            const title = headline(best?.result.text ?? "") ?? "Refined Idea";
            const points = keySentences(best?.result.text ?? "", KEY_SENTENCES_PER_SOURCE + 1);
            return { title: `Refined: ${title}`, text: points.map((sentence) => `- ${sentence}`).join("\n") };
        }
        if (!request.critique) return request.draft;

        const seen = new Set(splitSentences(request.draft.text).map((sentence) => sentence.replace(/^-\s+/, "").toLowerCase()));
        const additions = uniqueSentences([request.critique], seen);
        if (additions.length === 0) return request.draft;
        const lines = [
            request.draft.text,
            "",
            `Refined with input from ${request.critique.modelId}:`,
            ...additions.map((point) => `- ${point.sentence}`),
        ];
        return { title: request.draft.title, text: lines.join("\n") };
    }
}

const ComposedIdeaSchema = z.object({
    title: z.string().describe("A short title for the idea, under 80 characters."),
    text: z.string().describe("The synthesized idea in a few paragraphs or bullet points."),
});

const SYSTEM_PROMPTS: Record<ComposeRequest["method"], string> = {
    cluster_based:
        "You synthesize one coherent idea from several related responses to the same problem. Keep what they agree on, merge overlaps, and keep concrete details.",
    cross_pollination:
        "You combine complementary ideas from responses written by different models into one novel idea that none of them proposed alone.",
    refinement:
        "You improve a draft idea. Use the critique response to fill gaps, correct weaknesses and add concrete steps. Keep what already works.",
};

function describeSources(sources: readonly SourceResult[]): string {
    return sources
        .map((source, index) => `Response ${index + 1} (model ${source.modelId}, score ${source.score.toFixed(2)}):\n${source.result.text}`)
        .join("\n\n---\n\n");
}

export class ModelComposer implements IdeaComposer {
    private readonly client: LLMClient;

    constructor(client: LLMClient) {
        this.client = client;
    }

    async compose(request: ComposeRequest): Promise<ComposedIdea> {
        const parts: string[] = [];
        if (request.labels.length > 0) parts.push(`Themes: ${request.labels.join("; ")}`);
        if (request.draft) {
            parts.push(`Draft idea "${request.draft.title}":\n${request.draft.text}`);
            if (request.critique) parts.push(`Critique input:\n${request.critique.result.text}`);
            else return request.draft;
        } else {
            parts.push(describeSources(request.sources));
        }

        const { object } = await this.client.generateObject(ComposedIdeaSchema, parts.join("\n\n"), {
            system: SYSTEM_PROMPTS[request.method],
            temperature: 0.4,
        });
        return { title: object.title.slice(0, TITLE_MAX_LENGTH), text: object.text };
    }
}

/**
 * Uses `primary` and falls back to `fallback` when it throws, reporting the
 * failure through `onFallback`.
 */
export class FallbackComposer implements IdeaComposer {
    private readonly primary: IdeaComposer;
    private readonly fallback: IdeaComposer;
    private readonly onFallback?: (error: Error) => void;

    constructor(primary: IdeaComposer, fallback: IdeaComposer, onFallback?: (error: Error) => void) {
        this.primary = primary;
        this.fallback = fallback;
        this.onFallback = onFallback;
    }

    async compose(request: ComposeRequest): Promise<ComposedIdea> {
        try {
            return await this.primary.compose(request);
        } catch (err) {
            this.onFallback?.(err instanceof Error ? err : new Error(String(err)));
            return this.fallback.compose(request);
        }
    }
}
