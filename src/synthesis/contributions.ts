/**
 * Model contribution shares. Every function returns shares over exactly
 * the models present in `sources`, summing to 1, keyed in model id order.
 */
import type { SourceResult } from "./types.js";

function toShares(weights: Map<string, number>): Record<string, number> {
    const total = [...weights.values()].reduce((sum, weight) => sum + weight, 0);
    const shares: Record<string, number> = {};
    for (const modelId of [...weights.keys()].sort()) {
        shares[modelId] = (weights.get(modelId) ?? 0) / total;
    }
    return shares;
}

function accumulate(sources: readonly SourceResult[], weightOf: (source: SourceResult) => number): Map<string, number> {
    const weights = new Map<string, number>();
    for (const source of sources) {
        weights.set(source.modelId, (weights.get(source.modelId) ?? 0) + weightOf(source));
    }
    return weights;
}

/** Each model's share of the sources it produced. */
export function sharesByCount(sources: readonly SourceResult[]): Record<string, number> {
    return toShares(accumulate(sources, () => 1));
}

/** The same share for every distinct model. */
export function sharesEvenly(sources: readonly SourceResult[]): Record<string, number> {
    return toShares(new Map(sources.map((source) => [source.modelId, 1])));
}

/** Each model's share of the total score; by count when the total is 0. */
export function sharesByScore(sources: readonly SourceResult[]): Record<string, number> {
    const weights = accumulate(sources, (source) => source.score);
    const total = [...weights.values()].reduce((sum, weight) => sum + weight, 0);
    return total > 0 ? toShares(weights) : sharesByCount(sources);
}

export function averageScore(sources: readonly SourceResult[]): number {
    if (sources.length === 0) return 0;
    const mean = sources.reduce((sum, source) => sum + source.score, 0) / sources.length;
    return Math.min(1, Math.max(0, mean));
}
