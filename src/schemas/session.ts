/**
 * Session State Schemas — the persisted record of one exploration session.
 *
 * The document is versioned. `SESSION_VERSION` documents are validated
 * directly; older shapes go through `migrateSessionDocument` first.
 */
import { z } from "zod/v4";
import { Catalogs } from "./catalog.js";
import { ScoringConfig, SynthesisMethodName } from "./config.js";

export const SESSION_VERSION = 2;

export const ResultStatus = z.enum(["succeeded", "failed"]);
export type ResultStatus = z.infer<typeof ResultStatus>;

/** Raw generated text and status for one Combination. */
export const Result = z.object({
    id: z.string().min(1),
    combination_id: z.string().min(1),
    prompt: z.string(),
    text: z.string(),
    status: ResultStatus,
    simulated: z.boolean().default(false),
    error: z.string().optional(),
    attempts: z.number().int().min(0).default(1),
    executed_at: z.string(),
    duration_ms: z.number().min(0).default(0),
});
export type Result = z.infer<typeof Result>;

/** Per-criterion values in [0,1] plus the weighted aggregate. */
export const Score = z.object({
    result_id: z.string().min(1),
    criteria: z.record(z.string(), z.number().min(0).max(1)),
    aggregate: z.number().min(0).max(1),
    /** Revision of the scoring snapshot that produced this score. */
    scoring_revision: z.number().int().min(0).default(0),
});
export type Score = z.infer<typeof Score>;

/**
 * One (model, instruction, query, domain) tuple. `id` is the tuple key, so
 * the same tuple can never appear twice in a session.
 */
export const Combination = z.object({
    id: z.string().min(1),
    model_id: z.string().min(1),
    instruction_id: z.string().min(1),
    query_id: z.string().min(1),
    domain_id: z.string().min(1).nullable(),
    result: Result.optional(),
    score: Score.optional(),
    cluster_id: z.string().optional(),
});
export type Combination = z.infer<typeof Combination>;

export const ClusterMethod = z.enum(["kmeans", "keyword_overlap"]);
export type ClusterMethod = z.infer<typeof ClusterMethod>;

export const Cluster = z.object({
    id: z.string().min(1),
    /** The pipeline run that produced this cluster. */
    run: z.number().int().min(0),
    label: z.string(),
    method: ClusterMethod,
    member_result_ids: z.array(z.string()).min(1),
    centroid: z.array(z.number()).nullable(),
});
export type Cluster = z.infer<typeof Cluster>;

export const SynthesizedIdea = z.object({
    id: z.string().min(1),
    run: z.number().int().min(0),
    title: z.string(),
    text: z.string(),
    method: SynthesisMethodName,
    source_cluster_ids: z.array(z.string()).default([]),
    source_result_ids: z.array(z.string()).min(1),
    /** model id → share of influence; shares sum to 1 across source models. */
    contributions: z.record(z.string(), z.number().min(0).max(1)),
    average_score: z.number().min(0).max(1),
    created_at: z.string(),
});
export type SynthesizedIdea = z.infer<typeof SynthesizedIdea>;

export const SessionDocument = z.object({
    version: z.literal(SESSION_VERSION),
    session_id: z.string().min(1),
    created_at: z.string(),
    updated_at: z.string(),
    run_count: z.number().int().min(0).default(0),
    catalogs: Catalogs.prefault({}),
    scoring: ScoringConfig.optional(),
    combinations: z.array(Combination).default([]),
    clusters: z.array(Cluster).default([]),
    ideas: z.array(SynthesizedIdea).default([]),
});
export type SessionDocument = z.infer<typeof SessionDocument>;
