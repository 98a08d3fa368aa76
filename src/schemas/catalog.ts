/**
 * Catalog Schemas — the four dimensions a Combination is drawn from.
 */
import { z } from "zod/v4";

/** Providers the Model Invoker knows how to reach. `simulated` never calls out. */
export const ProviderName = z.enum(["openai", "anthropic", "google", "simulated"]);
export type ProviderName = z.infer<typeof ProviderName>;

/**
 * Set on entries rebuilt from a legacy session document. The first
 * registered entry with the same id replaces them, even once referenced.
 */
const LegacyPlaceholder = z.literal(true).optional();

export const ModelParameters = z.object({
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    top_p: z.number().min(0).max(1).optional(),
});
export type ModelParameters = z.infer<typeof ModelParameters>;

/**
 * A model the session can execute against. Immutable once a Combination
 * references it.
 */
export const ModelDescriptor = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    provider: ProviderName,
    /** Provider-side model identifier, e.g. "gpt-4o-mini". */
    model: z.string().min(1),
    parameters: ModelParameters.default({}),
    legacy_placeholder: LegacyPlaceholder,
});
export type ModelDescriptor = z.infer<typeof ModelDescriptor>;

/**
 * An instruction style. `template` carries `{placeholder}` markers; `{domain}`
 * is filled with the domain description at prompt time.
 */
export const InstructionTemplate = z.object({
    id: z.string().min(1),
    name: z.string(),
    template: z.string(),
    metadata: z.record(z.string(), z.string()).default({}),
    legacy_placeholder: LegacyPlaceholder,
});
export type InstructionTemplate = z.infer<typeof InstructionTemplate>;

export const QueryOrigin = z.enum(["base", "generated", "user_override"]);
export type QueryOrigin = z.infer<typeof QueryOrigin>;

export const QueryVariant = z.object({
    id: z.string().min(1),
    text: z.string(),
    origin: QueryOrigin,
    /** The base query a generated variant was derived from. */
    base_id: z.string().optional(),
    variables: z.record(z.string(), z.string()).default({}),
    legacy_placeholder: LegacyPlaceholder,
});
export type QueryVariant = z.infer<typeof QueryVariant>;

/** Keywords are used for prompt grounding and the specificity heuristic. */
export const Domain = z.object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string(),
    keywords: z.array(z.string()).default([]),
    legacy_placeholder: LegacyPlaceholder,
});
export type Domain = z.infer<typeof Domain>;

/** The catalogs actually used by a session. */
export const Catalogs = z.object({
    models: z.array(ModelDescriptor).default([]),
    instructions: z.array(InstructionTemplate).default([]),
    queries: z.array(QueryVariant).default([]),
    domains: z.array(Domain).default([]),
});
export type Catalogs = z.infer<typeof Catalogs>;
