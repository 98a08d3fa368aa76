/**
 * Pattern Detector — recurring word n-grams across a set of Result texts.
 *
 * Used on its own as a diagnostic and by the Cluster Analyzer to label
 * clusters and to build keyword sets for the fallback grouping.
 */
import type { PatternSettings } from "../schemas/config.js";
import { ConfigurationError } from "../errors/index.js";
import { isStopword, tokenize } from "./text.js";

export interface PatternSource {
    id: string;
    text: string;
}

export interface Pattern {
    phrase: string;
    /** Number of words in the phrase. */
    length: number;
    /** Total occurrences across all texts. */
    frequency: number;
    /** Ids of the texts containing the phrase, in input order. */
    supporting_result_ids: string[];
}

export function validatePatternSettings(settings: PatternSettings): void {
    if (settings.min_phrase_length < 1) {
        throw new ConfigurationError("min_phrase_length", "must be at least 1");
    }
    if (settings.max_phrase_length < settings.min_phrase_length) {
        throw new ConfigurationError("max_phrase_length", "must not be below min_phrase_length");
    }
    if (settings.min_frequency < 1) {
        throw new ConfigurationError("min_frequency", "must be at least 1");
    }
}

/**
 * Count contiguous word n-grams for every length in
 * [min_phrase_length, max_phrase_length] and keep those seen at least
 * `min_frequency` times. Ranked by frequency, then longer phrases first,
 * then alphabetically.
 */
export function detectPatterns(sources: readonly PatternSource[], settings: PatternSettings): Pattern[] {
    validatePatternSettings(settings);

    const counts = new Map<string, { length: number; frequency: number; ids: string[] }>();

    for (const source of sources) {
        const words = tokenize(source.text);
        for (let n = settings.min_phrase_length; n <= settings.max_phrase_length; n++) {
            for (let start = 0; start + n <= words.length; start++) {
                const phrase = words.slice(start, start + n).join(" ");
                let entry = counts.get(phrase);
                if (!entry) {
                    entry = { length: n, frequency: 0, ids: [] };
                    counts.set(phrase, entry);
                }
                entry.frequency++;
                if (!entry.ids.includes(source.id)) entry.ids.push(source.id);
            }
        }
    }

    const patterns: Pattern[] = [];
    for (const [phrase, entry] of counts) {
        if (entry.frequency < settings.min_frequency) continue;
        patterns.push({
            phrase,
            length: entry.length,
            frequency: entry.frequency,
            supporting_result_ids: entry.ids,
        });
    }

    return patterns.sort((a, b) =>
        b.frequency - a.frequency ||
        b.length - a.length ||
        (a.phrase < b.phrase ? -1 : a.phrase > b.phrase ? 1 : 0),
    );
}

/** A phrase that neither starts nor ends with a stopword. */
export function isContentPhrase(phrase: string): boolean {
    const words = phrase.split(" ");
    return !isStopword(words[0]) && !isStopword(words[words.length - 1]);
}
