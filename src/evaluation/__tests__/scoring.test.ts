/**
 * Scoring Engine Tests — heuristic values, weighting, degradation and
 * ranking.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import {
    CRITERION_HEURISTICS,
    ScoringEngine,
    buildCorpus,
    normalizeScoringConfig,
    rankResults,
} from "../../evaluation/scoring.js";
import { ConfigurationError, ScoringError } from "../../errors/index.js";
import { CriterionFunction, DEFAULT_SCORING_CRITERIA } from "../../schemas/config.js";
import type { ScoringConfig } from "../../schemas/config.js";
import type { Combination } from "../../schemas/session.js";
import { makeResult } from "../../__tests__/fixtures.js";

function config(weights: Partial<Record<CriterionFunction, number>>, revision = 0): ScoringConfig {
    const criteria: ScoringConfig["criteria"] = {};
    for (const fn of CriterionFunction.options) {
        const weight = weights[fn];
        if (weight !== undefined) criteria[fn] = { description: "", weight, function: fn };
    }
    return { revision, criteria };
}

function words(first: string, count: number): string {
    return [first, ...Array<string>(count - 1).fill("word")].join(" ");
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe("criterion heuristics", () => {
    const empty = buildCorpus([], []);

    it("novelty rewards words other responses do not use", () => {
        const corpus = buildCorpus(["solar panels", "solar roofs"], []);

        expect(CRITERION_HEURISTICS.novelty("solar panels", corpus)).toBe(0.5);
        expect(CRITERION_HEURISTICS.novelty("solar panels", buildCorpus(["solar panels"], []))).toBe(1);
    });

    it("feasibility saturates at five percent lexicon density", () => {
        expect(CRITERION_HEURISTICS.feasibility("pilot the plan", empty)).toBe(1);
        expect(CRITERION_HEURISTICS.feasibility(words("pilot", 40), empty)).toBeCloseTo(0.5, 10);
        expect(CRITERION_HEURISTICS.feasibility("", empty)).toBe(0);
    });

    it("specificity counts numbers and domain keywords", () => {
        const corpus = buildCorpus([], ["Cold Chain"]);

        expect(CRITERION_HEURISTICS.specificity(words("40", 40), corpus)).toBeCloseTo(0.5, 10);
        expect(CRITERION_HEURISTICS.specificity(`${words("word", 38)} cold chain`, corpus)).toBeCloseTo(0.5, 10);
    });

    it("comprehensiveness combines sentences and list items", () => {
        expect(CRITERION_HEURISTICS.comprehensiveness("One. Two. Three. Four. Five.", empty)).toBeCloseTo(0.3, 10);
        expect(CRITERION_HEURISTICS.comprehensiveness("- a\n- b\n- c\n- d\n- e", empty)).toBeCloseTo(0.7, 10);
    });

    it("clarity peaks at twenty words per sentence", () => {
        expect(CRITERION_HEURISTICS.clarity(`${words("start", 20)}.`, empty)).toBe(1);
        expect(CRITERION_HEURISTICS.clarity(`${words("start", 10)}.`, empty)).toBe(0.5);
    });
});

describe("normalizeScoringConfig()", () => {
    it("rescales weights to sum to one", () => {
        const normalized = normalizeScoringConfig(config({ novelty: 2, feasibility: 6 }, 4));

        expect(normalized.revision).toBe(4);
        expect(normalized.criteria.novelty.weight).toBe(0.25);
        expect(normalized.criteria.feasibility.weight).toBe(0.75);
    });

    it("rejects empty, negative and zero-total weights", () => {
        expect(() => normalizeScoringConfig({ revision: 0, criteria: {} })).toThrow(ConfigurationError);
        expect(() => normalizeScoringConfig(config({ novelty: -1, feasibility: 2 }))).toThrow(ConfigurationError);
        expect(() => normalizeScoringConfig(config({ novelty: 0 }))).toThrow(ConfigurationError);
    });
});

describe("ScoringEngine", () => {
    it("gives failed and empty results a zero score", () => {
        const engine = new ScoringEngine({ revision: 2, criteria: DEFAULT_SCORING_CRITERIA });
        const scores = engine.scoreAll([
            makeResult({ id: "r1", combination_id: "c1", status: "failed", text: "" }),
            makeResult({ id: "r2", combination_id: "c2", text: "   " }),
        ], []);

        const zero = { novelty: 0, feasibility: 0, specificity: 0, comprehensiveness: 0 };
        expect(scores.get("r1")).toEqual({ result_id: "r1", criteria: zero, aggregate: 0, scoring_revision: 2 });
        expect(scores.get("r2")).toEqual({ result_id: "r2", criteria: zero, aggregate: 0, scoring_revision: 2 });
    });

    it("aggregates criteria by normalized weight", () => {
        const engine = new ScoringEngine(config({ clarity: 1, comprehensiveness: 1 }));
        const score = engine.score(
            makeResult({ id: "r1", combination_id: "c1", text: "One two three four five six seven eight nine ten." }),
            buildCorpus([], []),
        );

        expect(score.criteria.clarity).toBe(0.5);
        expect(score.criteria.comprehensiveness).toBeCloseTo(0.06, 10);
        expect(score.aggregate).toBeCloseTo(0.28, 10);
    });

    it("is deterministic for identical text and configuration", () => {
        const results = [
            makeResult({ id: "r1", combination_id: "c1", text: "Pilot 3 compost hubs. Train staff on sorting." }),
            makeResult({ id: "r2", combination_id: "c2", text: "Pilot 3 compost hubs. Train staff on sorting." }),
            makeResult({ id: "r3", combination_id: "c3", text: "Share surplus food through an app." }),
        ];
        const first = new ScoringEngine({ revision: 0, criteria: DEFAULT_SCORING_CRITERIA }).scoreAll(results, ["compost"]);
        const second = new ScoringEngine({ revision: 0, criteria: DEFAULT_SCORING_CRITERIA }).scoreAll(results, ["compost"]);

        expect([...second.entries()]).toEqual([...first.entries()]);
        expect(first.get("r1")?.criteria).toEqual(first.get("r2")?.criteria);
    });

    it("degrades a result to zero when a heuristic throws", () => {
        vi.spyOn(CRITERION_HEURISTICS, "clarity").mockImplementation(() => {
            throw new Error("tokenizer exploded");
        });
        const onDegraded = vi.fn();
        const engine = new ScoringEngine(config({ clarity: 1, novelty: 1 }), { onDegraded });

        const score = engine.score(makeResult({ id: "r1", combination_id: "c1", text: "Some text." }), buildCorpus([], []));

        expect(score.aggregate).toBe(0);
        expect(score.criteria).toEqual({ clarity: 0, novelty: 0 });
        const error = onDegraded.mock.calls[0][0];
        expect(error).toBeInstanceOf(ScoringError);
        expect(error.criterion).toBe("clarity");
        expect(error.resultId).toBe("r1");
    });

    it("degrades non-finite heuristic values", () => {
        vi.spyOn(CRITERION_HEURISTICS, "novelty").mockReturnValue(Number.NaN);
        const engine = new ScoringEngine(config({ novelty: 1 }));

        const score = engine.score(makeResult({ id: "r1", combination_id: "c1", text: "Some text." }), buildCorpus([], []));

        expect(score.aggregate).toBe(0);
    });
});

describe("rankResults()", () => {
    function scored(id: string, aggregate: number, novelty: number, status: "succeeded" | "failed" = "succeeded"): Combination {
        return {
            id,
            model_id: "m1",
            instruction_id: "i1",
            query_id: "q1",
            domain_id: null,
            result: makeResult({ id: `r_${id}`, combination_id: id, status }),
            score: { result_id: `r_${id}`, criteria: { novelty }, aggregate, scoring_revision: 0 },
        };
    }

    const combinations = [
        scored("a", 0.4, 0.9),
        scored("b", 0.7, 0.1),
        scored("c", 0.7, 0.5),
        scored("d", 0.9, 0.9, "failed"),
    ];

    it("ranks succeeded results by aggregate with id tie-break", () => {
        expect(rankResults(combinations).map((entry) => entry.combination.id)).toEqual(["b", "c", "a"]);
    });

    it("ranks by a single criterion and limits the count", () => {
        const ranked = rankResults(combinations, "novelty", 2);

        expect(ranked.map((entry) => [entry.combination.id, entry.value])).toEqual([["a", 0.9], ["c", 0.5]]);
    });

    it("skips results without the requested criterion", () => {
        expect(rankResults(combinations, "clarity")).toEqual([]);
    });
});
