/**
 * Engine Configuration — every tunable parameter of a run in one document.
 *
 * The configuration file (`ideamesh.config.json`) is parsed through
 * `EngineConfig`; missing sections fall back to the defaults below.
 */
import { z } from "zod/v4";
import { Domain, InstructionTemplate, ModelParameters, ProviderName } from "./catalog.js";

/** Deterministic heuristics a criterion can be scored with. */
export const CriterionFunction = z.enum([
    "novelty",
    "feasibility",
    "specificity",
    "comprehensiveness",
    "clarity",
]);
export type CriterionFunction = z.infer<typeof CriterionFunction>;

export const ScoringCriterion = z.object({
    description: z.string().default(""),
    weight: z.number(),
    function: CriterionFunction,
});
export type ScoringCriterion = z.infer<typeof ScoringCriterion>;

/**
 * An immutable scoring snapshot. Feedback produces a new snapshot with a
 * higher revision instead of editing this one.
 */
export const ScoringConfig = z.object({
    revision: z.number().int().min(0).default(0),
    criteria: z.record(z.string(), ScoringCriterion),
});
export type ScoringConfig = z.infer<typeof ScoringConfig>;

export const DEFAULT_SCORING_CRITERIA: Record<string, ScoringCriterion> = {
    novelty: {
        description: "How much of the response is absent from its sibling responses.",
        weight: 0.3,
        function: "novelty",
    },
    feasibility: {
        description: "Density of implementation-oriented language.",
        weight: 0.25,
        function: "feasibility",
    },
    specificity: {
        description: "Density of concrete figures and domain vocabulary.",
        weight: 0.2,
        function: "specificity",
    },
    comprehensiveness: {
        description: "Breadth of the response by sentence count and structure.",
        weight: 0.25,
        function: "comprehensiveness",
    },
};

/**
 * A model entry as written in a configuration file. `provider` should be
 * given explicitly; older files without it are imported by name inference.
 */
export const ModelEntry = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    provider: ProviderName.optional(),
    model: z.string().min(1).optional(),
    parameters: ModelParameters.default({}),
});
export type ModelEntry = z.infer<typeof ModelEntry>;

export const BaseQueryEntry = z.object({
    id: z.string().min(1),
    text: z.string().min(1),
    variables: z.record(z.string(), z.string()).default({}),
});
export type BaseQueryEntry = z.infer<typeof BaseQueryEntry>;

export const PatternSettings = z.object({
    min_phrase_length: z.number().int().default(2),
    max_phrase_length: z.number().int().default(4),
    min_frequency: z.number().int().default(2),
});
export type PatternSettings = z.infer<typeof PatternSettings>;

export const ClusteringSettings = z.object({
    method: z.enum(["kmeans"]).default("kmeans"),
    n_clusters: z.number().int().min(1).default(5),
    /** k-means stops after this many assignment passes even if unstable. */
    max_iterations: z.number().int().min(1).default(100),
    /** How many top-scoring Results are clustered. */
    top_n: z.number().int().min(1).default(10),
    embedding: z.object({
        provider: z.enum(["openai", "none"]).default("openai"),
        model: z.string().default("text-embedding-3-small"),
    }).prefault({}),
});
export type ClusteringSettings = z.infer<typeof ClusteringSettings>;

export const SynthesisMethodName = z.enum(["cluster_based", "cross_pollination", "refinement"]);
export type SynthesisMethodName = z.infer<typeof SynthesisMethodName>;

export const FeedbackSettings = z.object({
    weights_adjustment: z.boolean().default(false),
    criteria_evolution: z.boolean().default(false),
    learning_rate: z.number().min(0).max(1).default(0.2),
});
export type FeedbackSettings = z.infer<typeof FeedbackSettings>;

export const ExtractionSettings = z.object({
    synthesis_methods: z.array(SynthesisMethodName).min(1).default(["cluster_based"]),
    /** Members (or representatives) a single idea may draw from. */
    max_sources: z.number().int().min(1).default(3),
    cross_pollination: z.object({
        blending: z.enum(["even", "score_weighted"]).default("even"),
    }).prefault({}),
    refinement: z.object({
        rounds: z.number().int().min(1).default(2),
    }).prefault({}),
    output_formats: z.array(z.enum(["markdown", "json"])).default(["markdown"]),
    feedback_integration: FeedbackSettings.prefault({}),
});
export type ExtractionSettings = z.infer<typeof ExtractionSettings>;

export const ExecutionSettings = z.object({
    /** Total attempts per combination, first call included. */
    max_attempts: z.number().int().min(1).default(3),
    base_delay_ms: z.number().int().min(0).default(500),
    max_delay_ms: z.number().int().min(0).default(8000),
    /** Pause between dispatches to stay under provider rate limits. */
    pace_ms: z.number().int().min(0).default(200),
    max_concurrency: z.number().int().min(1).default(1),
    per_provider_concurrency: z.number().int().min(1).default(1),
});
export type ExecutionSettings = z.infer<typeof ExecutionSettings>;

/**
 * The configuration document consumed by the engine. Catalog sections are
 * optional; the bundled defaults are used for any that are missing.
 */
export const EngineConfig = z.object({
    models: z.array(ModelEntry).optional(),
    instructions: z.array(InstructionTemplate).optional(),
    queries: z.array(BaseQueryEntry).optional(),
    domains: z.array(Domain).optional(),
    scoring_criteria: z.record(z.string(), ScoringCriterion).default(DEFAULT_SCORING_CRITERIA),
    evaluation_settings: z.object({
        clustering: ClusteringSettings.prefault({}),
        pattern_detection: PatternSettings.prefault({}),
    }).prefault({}),
    extraction_settings: ExtractionSettings.prefault({}),
    execution: ExecutionSettings.prefault({}),
});
export type EngineConfig = z.infer<typeof EngineConfig>;
