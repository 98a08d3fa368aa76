/**
 * Scoring Engine — weighted multi-criterion score per Result.
 *
 * Every criterion maps to a deterministic heuristic in CRITERION_HEURISTICS.
 * The engine holds one normalized ScoringConfig snapshot; feedback creates a
 * new engine from a new snapshot instead of changing this one.
 */
import { z } from "zod/v4";
import type { CriterionFunction, ScoringConfig } from "../schemas/config.js";
import type { Combination, Result, Score } from "../schemas/session.js";
import { ConfigurationError, ScoringError } from "../errors/index.js";
import { readDataFile } from "../catalog/data.js";
import { contentTokens, splitSentences, structuredLines, tokenize } from "./text.js";

/** Corpus-level facts some heuristics compare a text against. */
export interface ScoringCorpus {
    /** Number of texts each distinct content token appears in. */
    documentFrequency: Map<string, number>;
    size: number;
    /** Session-wide domain keywords, tokenized. */
    keywordPhrases: string[][];
}

export type CriterionHeuristic = (text: string, corpus: ScoringCorpus) => number;

/** Density at which the keyword-based heuristics saturate at 1. */
const DENSITY_SATURATION = 0.05;

let feasibilityTerms: ReadonlySet<string> | null = null;

function feasibilityLexicon(): ReadonlySet<string> {
    if (!feasibilityTerms) {
        const lexicon = readDataFile("lexicon.json", z.object({ feasibility: z.array(z.string()) }));
        feasibilityTerms = new Set(lexicon.feasibility);
    }
    return feasibilityTerms;
}

function countPhrase(words: readonly string[], phrase: readonly string[]): number {
    if (phrase.length === 0) return 0;
    let count = 0;
    for (let start = 0; start + phrase.length <= words.length; start++) {
        let match = true;
        for (let i = 0; i < phrase.length; i++) {
            if (words[start + i] !== phrase[i]) {
                match = false;
                break;
            }
        }
        if (match) count++;
    }
    return count;
}

export const CRITERION_HEURISTICS: Record<CriterionFunction, CriterionHeuristic> = {
    novelty: (text, corpus) => {
        const distinct = new Set(contentTokens(text));
        if (distinct.size === 0) return 0;
        if (corpus.size <= 1) return 1;
        let total = 0;
        for (const token of distinct) {
            const df = Math.max(corpus.documentFrequency.get(token) ?? 1, 1);
            total += 1 - (df - 1) / (corpus.size - 1);
        }
        return total / distinct.size;
    },

    feasibility: (text) => {
        const words = tokenize(text);
        if (words.length === 0) return 0;
        const lexicon = feasibilityLexicon();
        const hits = words.filter((word) => lexicon.has(word)).length;
        return Math.min(1, hits / words.length / DENSITY_SATURATION);
    },

    specificity: (text, corpus) => {
        const words = tokenize(text);
        if (words.length === 0) return 0;
        const numbers = words.filter((word) => /^\d/.test(word)).length;
        let keywordHits = 0;
        for (const phrase of corpus.keywordPhrases) {
            keywordHits += countPhrase(words, phrase);
        }
        return Math.min(1, (numbers + keywordHits) / words.length / DENSITY_SATURATION);
    },

    comprehensiveness: (text) => {
        const sentences = splitSentences(text).length;
        const structured = structuredLines(text).length;
        return 0.6 * Math.min(1, sentences / 10) + 0.4 * Math.min(1, structured / 5);
    },

    clarity: (text) => {
        const sentences = splitSentences(text);
        if (sentences.length === 0) return 0;
        const averageWords = tokenize(text).length / sentences.length;
        return Math.max(0, 1 - Math.abs(averageWords - 20) / 20);
    },
};

/**
 * Validate criteria and rescale weights to sum to 1.
 * Throws ConfigurationError on an empty set, negative or non-finite weights,
 * or a zero total.
 */
export function normalizeScoringConfig(config: ScoringConfig): ScoringConfig {
    const entries = Object.entries(config.criteria);
    if (entries.length === 0) {
        throw new ConfigurationError("scoring_criteria", "at least one criterion is required");
    }

    let total = 0;
    for (const [name, criterion] of entries) {
        if (!Number.isFinite(criterion.weight) || criterion.weight < 0) {
            throw new ConfigurationError(`scoring_criteria.${name}.weight`, "must be a non-negative number");
        }
        total += criterion.weight;
    }
    if (total <= 0) {
        throw new ConfigurationError("scoring_criteria", "weights must not all be zero");
    }

    const criteria: ScoringConfig["criteria"] = {};
    for (const [name, criterion] of entries) {
        criteria[name] = { ...criterion, weight: criterion.weight / total };
    }
    return { revision: config.revision, criteria };
}

/** Build the corpus from the texts being scored together. */
export function buildCorpus(texts: readonly string[], domainKeywords: readonly string[]): ScoringCorpus {
    const documentFrequency = new Map<string, number>();
    for (const text of texts) {
        for (const token of new Set(contentTokens(text))) {
            documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
        }
    }
    const keywordPhrases = [...new Set(domainKeywords.map((keyword) => keyword.toLowerCase()))]
        .map((keyword) => tokenize(keyword))
        .filter((phrase) => phrase.length > 0);
    return { documentFrequency, size: texts.length, keywordPhrases };
}

export function isScorable(result: Result): boolean {
    return result.status === "succeeded" && result.text.trim().length > 0;
}

export interface ScoringEngineOptions {
    /** Called when a Result is degraded to a zero score. */
    onDegraded?: (error: ScoringError) => void;
}

export class ScoringEngine {
    public readonly config: ScoringConfig;
    private readonly onDegraded?: (error: ScoringError) => void;

    constructor(config: ScoringConfig, options: ScoringEngineOptions = {}) {
        this.config = normalizeScoringConfig(config);
        this.onDegraded = options.onDegraded;
    }

    /** All criteria at 0; used for failed, empty and malformed Results. */
    zeroScore(resultId: string): Score {
        const criteria: Record<string, number> = {};
        for (const name of Object.keys(this.config.criteria)) criteria[name] = 0;
        return { result_id: resultId, criteria, aggregate: 0, scoring_revision: this.config.revision };
    }

    score(result: Result, corpus: ScoringCorpus): Score {
        if (!isScorable(result)) return this.zeroScore(result.id);

        try {
            const criteria: Record<string, number> = {};
            let weighted = 0;
            let weightTotal = 0;
            for (const [name, criterion] of Object.entries(this.config.criteria)) {
                const value = this.evaluate(result, name, criterion.function, corpus);
                criteria[name] = value;
                weighted += criterion.weight * value;
                weightTotal += criterion.weight;
            }
            const aggregate = weightTotal > 0 ? Math.min(1, Math.max(0, weighted / weightTotal)) : 0;
            return { result_id: result.id, criteria, aggregate, scoring_revision: this.config.revision };
        } catch (err) {
            if (err instanceof ScoringError) {
                this.onDegraded?.(err);
                return this.zeroScore(result.id);
            }
            throw err;
        }
    }

    /**
     * Score a batch together: the corpus is every scorable text in `results`,
     * so identical texts in one batch always receive identical scores.
     */
    scoreAll(results: readonly Result[], domainKeywords: readonly string[]): Map<string, Score> {
        const corpus = buildCorpus(
            results.filter(isScorable).map((result) => result.text),
            domainKeywords,
        );
        const scores = new Map<string, Score>();
        for (const result of results) {
            scores.set(result.id, this.score(result, corpus));
        }
        return scores;
    }

    private evaluate(
        result: Result,
        criterion: string,
        fn: CriterionFunction,
        corpus: ScoringCorpus,
    ): number {
        let value: number;
        try {
            value = CRITERION_HEURISTICS[fn](result.text, corpus);
        } catch (err) {
            throw new ScoringError(result.id, criterion, err instanceof Error ? err.message : String(err));
        }
        if (!Number.isFinite(value)) {
            throw new ScoringError(result.id, criterion, `heuristic "${fn}" returned ${value}`);
        }
        return Math.min(1, Math.max(0, value));
    }
}

export interface RankedResult {
    combination: Combination;
    result: Result;
    score: Score;
    value: number;
}

/**
 * Executed, scored and succeeded Results ranked by `overall` (the aggregate)
 * or by a single criterion. Ties keep combination id order.
 */
export function rankResults(
    combinations: readonly Combination[],
    criterion: string = "overall",
    limit: number = Number.POSITIVE_INFINITY,
): RankedResult[] {
    const ranked: RankedResult[] = [];
    for (const combination of combinations) {
        const { result, score } = combination;
        if (!result || !score || result.status !== "succeeded") continue;
        const value = criterion === "overall" ? score.aggregate : score.criteria[criterion];
        if (value === undefined) continue;
        ranked.push({ combination, result, score, value });
    }
    ranked.sort((a, b) =>
        b.value - a.value ||
        (a.combination.id < b.combination.id ? -1 : a.combination.id > b.combination.id ? 1 : 0),
    );
    return ranked.slice(0, limit);
}
