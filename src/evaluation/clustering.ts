/**
 * Cluster Analyzer — groups the top-scoring Results.
 *
 * Primary path: k-means over L2-normalized embeddings with deterministic
 * farthest-point seeding. When no embedder is configured or embedding fails,
 * Results are grouped by overlap of their recurring phrases instead.
 * Either way exactly min(n_clusters, N) non-empty clusters come back.
 */
import type { ClusteringSettings, PatternSettings } from "../schemas/config.js";
import type { Cluster, ClusterMethod, Combination } from "../schemas/session.js";
import type { Embedder } from "../llm/embedder.js";
import { ClusteringError } from "../errors/index.js";
import { rankResults } from "./scoring.js";
import type { RankedResult } from "./scoring.js";
import { detectPatterns, isContentPhrase } from "./patterns.js";
import type { PatternSource } from "./patterns.js";
import { contentTokens, jaccard } from "./text.js";

export interface ClusterAnalysisInput {
    combinations: readonly Combination[];
    settings: ClusteringSettings;
    patternSettings: PatternSettings;
    embedder?: Embedder;
    /** Run index; cluster ids are `c<run>-<n>`. */
    run: number;
}

export interface ClusterAnalysis {
    clusters: Cluster[];
    method: ClusterMethod;
    /** Why the keyword path ran instead of k-means. */
    fallbackReason?: string;
}

export interface KMeansResult {
    /** Cluster index per input vector. */
    assignments: number[];
    centroids: number[][];
    iterations: number;
}

export function l2Normalize(vector: readonly number[]): number[] {
    let norm = 0;
    for (const value of vector) norm += value * value;
    norm = Math.sqrt(norm);
    return norm === 0 ? vector.map(() => 0) : vector.map((value) => value / norm);
}

export function squaredDistance(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const diff = a[i] - b[i];
        sum += diff * diff;
    }
    return sum;
}

function nearest(point: readonly number[], centroids: readonly number[][]): number {
    let best = 0;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (let c = 0; c < centroids.length; c++) {
        const distance = squaredDistance(point, centroids[c]);
        if (distance < bestDistance) {
            best = c;
            bestDistance = distance;
        }
    }
    return best;
}

function mean(points: readonly number[][], dimension: number): number[] {
    const centroid = new Array<number>(dimension).fill(0);
    for (const point of points) {
        for (let d = 0; d < dimension; d++) centroid[d] += point[d];
    }
    return centroid.map((value) => value / points.length);
}

/** Seeds: index 0 first, then repeatedly the point farthest from every chosen seed. */
function farthestPointSeeds(vectors: readonly number[][], k: number): number[] {
    const seeds = [0];
    const closest = vectors.map((vector) => squaredDistance(vector, vectors[0]));
    while (seeds.length < k) {
        let pick = -1;
        for (let i = 0; i < vectors.length; i++) {
            if (seeds.includes(i)) continue;
            if (pick === -1 || closest[i] > closest[pick]) pick = i;
        }
        seeds.push(pick);
        for (let i = 0; i < vectors.length; i++) {
            closest[i] = Math.min(closest[i], squaredDistance(vectors[i], vectors[pick]));
        }
    }
    return seeds;
}

/**
 * Move one point into each empty cluster, taken from the largest cluster
 * (lowest index on ties): the member farthest from that cluster's centroid.
 */
function refillEmptyClusters(vectors: readonly number[][], assignments: number[], centroids: readonly number[][]): void {
    const k = centroids.length;
    for (let empty = 0; empty < k; empty++) {
        const sizes = new Array<number>(k).fill(0);
        for (const cluster of assignments) sizes[cluster]++;
        if (sizes[empty] > 0) continue;

        let donor = 0;
        for (let c = 1; c < k; c++) {
            if (sizes[c] > sizes[donor]) donor = c;
        }
        let moved = -1;
        let movedDistance = -1;
        for (let i = 0; i < vectors.length; i++) {
            if (assignments[i] !== donor) continue;
            const distance = squaredDistance(vectors[i], centroids[donor]);
            if (distance > movedDistance) {
                moved = i;
                movedDistance = distance;
            }
        }
        assignments[moved] = empty;
    }
}

/**
 * Deterministic k-means. Assignment ties go to the lowest cluster index;
 * stops when assignments are stable or after `maxIterations` passes.
 */
export function kMeans(vectors: readonly number[][], k: number, maxIterations: number): KMeansResult {
    if (vectors.length === 0 || k < 1) return { assignments: [], centroids: [], iterations: 0 };
    const clusterCount = Math.min(k, vectors.length);
    const dimension = vectors[0].length;

    let centroids = farthestPointSeeds(vectors, clusterCount).map((index) => [...vectors[index]]);
    let assignments = new Array<number>(vectors.length).fill(-1);
    let iterations = 0;

    while (iterations < maxIterations) {
        iterations++;
        const next = vectors.map((vector) => nearest(vector, centroids));
        refillEmptyClusters(vectors, next, centroids);
        const stable = next.every((cluster, i) => cluster === assignments[i]);
        assignments = next;
        centroids = centroids.map((_, c) =>
            mean(vectors.filter((_, i) => assignments[i] === c), dimension),
        );
        if (stable) break;
    }
    return { assignments, centroids, iterations };
}

async function embed(embedder: Embedder, texts: readonly string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
        vectors = await embedder.embedMany(texts);
    } catch (err) {
        throw new ClusteringError(err instanceof Error ? err.message : String(err));
    }
    if (vectors.length !== texts.length) {
        throw new ClusteringError(`expected ${texts.length} embeddings, received ${vectors.length}`);
    }
    const dimension = vectors[0]?.length ?? 0;
    if (dimension === 0 || vectors.some((vector) => vector.length !== dimension || vector.some((v) => !Number.isFinite(v)))) {
        throw new ClusteringError("embeddings are empty, ragged or non-finite");
    }
    return vectors.map(l2Normalize);
}

/** Phrases a Result shares with the others; its content words when it shares none. */
function keywordSets(sources: readonly PatternSource[], patternSettings: PatternSettings): Set<string>[] {
    const patterns = detectPatterns(sources, patternSettings).filter((pattern) => isContentPhrase(pattern.phrase));
    return sources.map((source) => {
        const keywords = new Set(
            patterns
                .filter((pattern) => pattern.supporting_result_ids.includes(source.id))
                .map((pattern) => pattern.phrase),
        );
        return keywords.size > 0 ? keywords : new Set(contentTokens(source.text));
    });
}

/**
 * Keyword-overlap grouping: farthest-Jaccard seeding from index 0, then
 * every other item joins the seed it overlaps most (lowest index on ties).
 */
export function groupByKeywordOverlap(keywords: readonly Set<string>[], k: number): number[] {
    if (keywords.length === 0 || k < 1) return [];
    const clusterCount = Math.min(k, keywords.length);

    const seeds = [0];
    while (seeds.length < clusterCount) {
        let pick = -1;
        let pickSimilarity = Number.POSITIVE_INFINITY;
        for (let i = 0; i < keywords.length; i++) {
            if (seeds.includes(i)) continue;
            const similarity = Math.max(...seeds.map((seed) => jaccard(keywords[i], keywords[seed])));
            if (similarity < pickSimilarity) {
                pick = i;
                pickSimilarity = similarity;
            }
        }
        seeds.push(pick);
    }

    return keywords.map((set, i) => {
        const own = seeds.indexOf(i);
        if (own !== -1) return own;
        let best = 0;
        let bestSimilarity = -1;
        for (let c = 0; c < seeds.length; c++) {
            const similarity = jaccard(set, keywords[seeds[c]]);
            if (similarity > bestSimilarity) {
                best = c;
                bestSimilarity = similarity;
            }
        }
        return best;
    });
}

/** Most telling phrase of a group; its most frequent content word otherwise. */
export function labelFor(members: readonly PatternSource[], patternSettings: PatternSettings, index: number): string {
    const phrase = detectPatterns(members, patternSettings).find((pattern) => isContentPhrase(pattern.phrase));
    if (phrase) return phrase.phrase;

    const counts = new Map<string, number>();
    for (const member of members) {
        for (const token of contentTokens(member.text)) {
            counts.set(token, (counts.get(token) ?? 0) + 1);
        }
    }
    let label = "";
    let labelCount = 0;
    for (const [token, count] of counts) {
        if (count > labelCount || (count === labelCount && token < label)) {
            label = token;
            labelCount = count;
        }
    }
    return label || `cluster ${index + 1}`;
}

function buildClusters(
    ranked: readonly RankedResult[],
    assignments: readonly number[],
    centroids: readonly number[][] | null,
    method: ClusterMethod,
    input: ClusterAnalysisInput,
): Cluster[] {
    const clusterCount = assignments.length === 0 ? 0 : Math.max(...assignments) + 1;
    const clusters: Cluster[] = [];
    for (let c = 0; c < clusterCount; c++) {
        const members = ranked.filter((_, i) => assignments[i] === c);
        const sources = members.map((member) => ({ id: member.result.id, text: member.result.text }));
        clusters.push({
            id: `c${input.run}-${c}`,
            run: input.run,
            label: labelFor(sources, input.patternSettings, c),
            method,
            member_result_ids: sources.map((source) => source.id),
            centroid: centroids ? centroids[c] : null,
        });
    }
    return clusters;
}

export async function analyzeClusters(input: ClusterAnalysisInput): Promise<ClusterAnalysis> {
    const { settings, embedder } = input;
    const ranked = rankResults(input.combinations, "overall", settings.top_n);
    const texts = ranked.map((entry) => entry.result.text);

    let fallbackReason: string | undefined;
    if (!embedder) {
        fallbackReason = "no embedder configured";
    } else if (ranked.length > 0) {
        try {
            const vectors = await embed(embedder, texts);
            const { assignments, centroids } = kMeans(vectors, settings.n_clusters, settings.max_iterations);
            return {
                clusters: buildClusters(ranked, assignments, centroids, "kmeans", input),
                method: "kmeans",
            };
        } catch (err) {
            if (!(err instanceof ClusteringError)) throw err;
            fallbackReason = err.message;
        }
    } else {
        return { clusters: [], method: "kmeans" };
    }

    const sources = ranked.map((entry) => ({ id: entry.result.id, text: entry.result.text }));
    const assignments = groupByKeywordOverlap(keywordSets(sources, input.patternSettings), settings.n_clusters);
    return {
        clusters: buildClusters(ranked, assignments, null, "keyword_overlap", input),
        method: "keyword_overlap",
        fallbackReason,
    };
}
