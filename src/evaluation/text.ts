/**
 * Text primitives shared by scoring, pattern detection, clustering and
 * synthesis. Everything here is pure and deterministic.
 */
import { z } from "zod/v4";
import { readDataFile } from "../catalog/data.js";

const WORD_PATTERN = /[a-z0-9']+/g;

let stopwords: ReadonlySet<string> | null = null;

export function stopwordSet(): ReadonlySet<string> {
    if (!stopwords) {
        stopwords = new Set(readDataFile("stopwords.json", z.array(z.string())));
    }
    return stopwords;
}

/** Lower-cased word tokens; apostrophes stay inside words. */
export function tokenize(text: string): string[] {
    return (text.toLowerCase().match(WORD_PATTERN) ?? [])
        .map((token) => token.replace(/^'+|'+$/g, ""))
        .filter((token) => token.length > 0);
}

export function isStopword(token: string): boolean {
    return stopwordSet().has(token);
}

/** Tokens that are neither stopwords nor pure punctuation leftovers. */
export function contentTokens(text: string): string[] {
    return tokenize(text).filter((token) => !isStopword(token));
}

/** Split on sentence terminators and line breaks; empty pieces are dropped. */
export function splitSentences(text: string): string[] {
    return text
        .split(/(?<=[.!?])\s+|\n+/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => tokenize(sentence).length > 0);
}

/** Lines that look like list items: bullets, numbered items or "Idea N:" heads. */
export function structuredLines(text: string): string[] {
    return text
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => /^([-*•]\s+|\d+[.)]\s+|idea\s+\d+\s*:)/i.test(line));
}

export function titleCase(phrase: string): string {
    return phrase
        .split(/\s+/)
        .filter((word) => word.length > 0)
        .map((word) => word[0].toUpperCase() + word.slice(1))
        .join(" ");
}

/** Jaccard overlap of two sets; 0 when both are empty. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 0;
    let shared = 0;
    for (const item of a) {
        if (b.has(item)) shared++;
    }
    return shared / (a.size + b.size - shared);
}
