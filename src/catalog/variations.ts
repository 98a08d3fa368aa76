/**
 * Query variation generator — derives new query variants from a base query.
 *
 * Strategies are applied in a fixed rotation and phrases are picked from the
 * banks in `data/query-strategies.json` starting at an offset derived from the
 * base query, so the same base query always yields the same variants.
 */
import { createHash } from "crypto";
import { z } from "zod/v4";
import type { QueryVariant } from "../schemas/catalog.js";
import { readDataFile } from "./data.js";

export const VARIATION_STRATEGIES = ["constraint", "perspective", "context", "rephrase", "aspect", "approach"] as const;
export type VariationStrategy = (typeof VARIATION_STRATEGIES)[number];

const PhraseBanks = z.object({
    constraint: z.array(z.string()).min(1),
    perspective: z.array(z.string()).min(1),
    context: z.array(z.string()).min(1),
    aspect: z.array(z.string()).min(1),
    approach: z.array(z.string()).min(1),
    rephrase: z.array(z.tuple([z.string(), z.string()])).min(1),
});
type PhraseBanks = z.infer<typeof PhraseBanks>;

/** Variable set on the variant for each phrase-based strategy. */
const VARIABLE_NAMES: Record<Exclude<VariationStrategy, "rephrase">, string> = {
    constraint: "constraint",
    perspective: "perspective",
    context: "context",
    aspect: "focused_aspect",
    approach: "approach",
};

function stem(text: string): string {
    return text.trim().replace(/[?.!]+$/, "");
}

function lowerFirst(text: string): string {
    return text.length > 0 ? text[0].toLowerCase() + text.slice(1) : text;
}

function upperFirst(text: string): string {
    return text.length > 0 ? text[0].toUpperCase() + text.slice(1) : text;
}

function seedOf(text: string): number {
    return createHash("sha256").update(text).digest().readUInt32BE(0);
}

function rephrase(base: string, pairs: PhraseBanks["rephrase"]): string {
    const core = stem(base);
    const lowered = core.toLowerCase();
    for (const [from, to] of pairs) {
        if (lowered.startsWith(from)) {
            return `${upperFirst(to)}${core.slice(from.length)}?`;
        }
    }
    return `What new approaches could address ${lowerFirst(core)}?`;
}

function applyStrategy(strategy: VariationStrategy, base: QueryVariant, banks: PhraseBanks, pick: number): { text: string; phrase?: string } {
    const core = stem(base.text);
    switch (strategy) {
        case "constraint":
        case "perspective":
        case "context": {
            const phrase = banks[strategy][pick % banks[strategy].length];
            return { text: `${core}, ${phrase}?`, phrase };
        }
        case "rephrase":
            return { text: rephrase(base.text, banks.rephrase) };
        case "aspect": {
            const phrase = banks.aspect[pick % banks.aspect.length];
            return { text: `How might we address ${phrase} ${lowerFirst(core)}?`, phrase };
        }
        case "approach": {
            const phrase = banks.approach[pick % banks.approach.length];
            const lead = "how might we ";
            const rest = core.toLowerCase().startsWith(lead) ? core.slice(lead.length) : `tackle this: ${lowerFirst(core)}`;
            return { text: `${phrase} ${rest}?`, phrase };
        }
    }
}

/**
 * Up to `count` variants of `base` with distinct texts. Ids are
 * `<base id>_<strategy>_<n>`, n counting the variants produced.
 */
export function generateVariations(base: QueryVariant, count: number): QueryVariant[] {
    if (count <= 0) return [];
    const banks = readDataFile("query-strategies.json", PhraseBanks);
    const seed = seedOf(base.text);
    const seen = new Set([base.text.trim().toLowerCase()]);
    const variants: QueryVariant[] = [];

    const maxAttempts = count * VARIATION_STRATEGIES.length;
    for (let attempt = 0; attempt < maxAttempts && variants.length < count; attempt++) {
        const strategy = VARIATION_STRATEGIES[attempt % VARIATION_STRATEGIES.length];
        const round = Math.floor(attempt / VARIATION_STRATEGIES.length);
        const { text, phrase } = applyStrategy(strategy, base, banks, seed + round);
        const key = text.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);

        const variables = { ...base.variables };
        if (phrase !== undefined && strategy !== "rephrase") variables[VARIABLE_NAMES[strategy]] = phrase;
        variants.push({
            id: `${base.id}_${strategy}_${variants.length + 1}`,
            text,
            origin: "generated",
            base_id: base.id,
            variables,
        });
    }
    return variants;
}
