/**
 * Schema Tests — Validate the Zod schemas with valid and invalid payloads.
 */
import { describe, it, expect } from "vitest";
import {
    ModelDescriptor,
    QueryVariant,
    Domain,
    Result,
    Score,
    Combination,
    Cluster,
    SynthesizedIdea,
    SessionDocument,
    SESSION_VERSION,
    ScoringCriterion,
    ExtractionSettings,
    EngineConfig,
} from "../../schemas/index.js";

describe("ModelDescriptor", () => {
    it("parses a model with default parameters", () => {
        const model = ModelDescriptor.parse({ id: "fast", name: "GPT 4o mini", provider: "openai", model: "gpt-4o-mini" });
        expect(model.parameters).toEqual({});
    });

    it("rejects unknown providers and out-of-range parameters", () => {
        expect(() => ModelDescriptor.parse({ id: "x", name: "x", provider: "acme", model: "x" })).toThrow();
        expect(() => ModelDescriptor.parse({
            id: "x",
            name: "x",
            provider: "openai",
            model: "x",
            parameters: { temperature: 3 },
        })).toThrow();
    });
});

describe("QueryVariant", () => {
    it("accepts the three origins only", () => {
        expect(QueryVariant.parse({ id: "q", text: "Why?", origin: "user_override" }).variables).toEqual({});
        expect(() => QueryVariant.parse({ id: "q", text: "Why?", origin: "imported" })).toThrow();
    });
});

describe("Domain", () => {
    it("defaults keywords to empty", () => {
        expect(Domain.parse({ id: "d", name: "Health", description: "care" }).keywords).toEqual([]);
    });
});

describe("Result and Score", () => {
    it("parses a failed result with defaults", () => {
        const result = Result.parse({
            id: "r1",
            combination_id: "c1",
            prompt: "p",
            text: "",
            status: "failed",
            error: "quota exceeded",
            executed_at: "2025-01-01T00:00:00.000Z",
        });
        expect(result.simulated).toBe(false);
        expect(result.attempts).toBe(1);
    });

    it("keeps score values within [0,1]", () => {
        expect(() => Score.parse({ result_id: "r1", criteria: { novelty: 1.2 }, aggregate: 0.5 })).toThrow();
        expect(() => Score.parse({ result_id: "r1", criteria: {}, aggregate: -0.1 })).toThrow();
        expect(Score.parse({ result_id: "r1", criteria: {}, aggregate: 0 }).scoring_revision).toBe(0);
    });
});

describe("Combination", () => {
    it("allows the no-domain slot as null", () => {
        const combination = Combination.parse({
            id: "m::i::q::-",
            model_id: "m",
            instruction_id: "i",
            query_id: "q",
            domain_id: null,
        });
        expect(combination.result).toBeUndefined();
    });
});

describe("Cluster", () => {
    it("requires at least one member", () => {
        const cluster = { id: "c0-0", run: 0, label: "x", method: "kmeans", member_result_ids: [], centroid: null };
        expect(() => Cluster.parse(cluster)).toThrow();
        expect(Cluster.parse({ ...cluster, member_result_ids: ["r1"] }).method).toBe("kmeans");
    });
});

describe("SynthesizedIdea", () => {
    it("requires a source result and bounded shares", () => {
        const idea = {
            id: "idea_0_1",
            run: 0,
            title: "T",
            text: "Body",
            method: "refinement",
            source_result_ids: ["r1"],
            contributions: { m1: 1 },
            average_score: 0.4,
            created_at: "2025-01-01T00:00:00.000Z",
        };
        expect(SynthesizedIdea.parse(idea).source_cluster_ids).toEqual([]);
        expect(() => SynthesizedIdea.parse({ ...idea, source_result_ids: [] })).toThrow();
        expect(() => SynthesizedIdea.parse({ ...idea, contributions: { m1: 1.5 } })).toThrow();
    });
});

describe("SessionDocument", () => {
    it("fills empty collections and pins the version", () => {
        const doc = SessionDocument.parse({
            version: SESSION_VERSION,
            session_id: "s",
            created_at: "2025-01-01T00:00:00.000Z",
            updated_at: "2025-01-01T00:00:00.000Z",
        });
        expect(doc.combinations).toEqual([]);
        expect(doc.catalogs.models).toEqual([]);
        expect(() => SessionDocument.parse({ ...doc, version: SESSION_VERSION + 1 })).toThrow();
    });
});

describe("ScoringCriterion", () => {
    it("accepts known heuristics only", () => {
        expect(ScoringCriterion.parse({ weight: 1, function: "clarity" }).description).toBe("");
        expect(() => ScoringCriterion.parse({ weight: 1, function: "vibes" })).toThrow();
    });
});

describe("ExtractionSettings", () => {
    it("rejects an empty method list", () => {
        expect(() => ExtractionSettings.parse({ synthesis_methods: [] })).toThrow();
    });
});

describe("EngineConfig", () => {
    it("leaves catalog sections unset so bundled defaults apply", () => {
        const config = EngineConfig.parse({});
        expect(config.models).toBeUndefined();
        expect(config.domains).toBeUndefined();
        expect(Object.keys(config.scoring_criteria)).toEqual(["novelty", "feasibility", "specificity", "comprehensiveness"]);
    });

    it("rejects out-of-range learning rates", () => {
        expect(() => EngineConfig.parse({
            extraction_settings: { feedback_integration: { learning_rate: 2 } },
        })).toThrow();
    });
});
