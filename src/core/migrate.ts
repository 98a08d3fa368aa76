/**
 * Session document migration.
 *
 * Version-less documents use the flat legacy layout:
 *   { combinations: [{ id, model, template, query, domain }],
 *     results: { [id]: { prompt, response, metadata } },
 *     evaluations: { [id]: { [criterion]: number, overall } },
 *     synthesized_ideas: { [id]: { title, text, source_combinations, metadata } } }
 * They are rebuilt into the current layout before validation so nothing is
 * silently dropped on load.
 */
import { z } from "zod/v4";
import { v4 as uuidv4 } from "uuid";
import { SESSION_VERSION } from "../schemas/session.js";
import type { Combination, Result, Score, SessionDocument, SynthesizedIdea } from "../schemas/session.js";
import type { Domain, InstructionTemplate, ModelDescriptor, QueryVariant } from "../schemas/catalog.js";
import { SynthesisMethodName } from "../schemas/config.js";
import { StateIntegrityError } from "../errors/index.js";
import { inferProviderFromName } from "../llm/resolve.js";
import { tupleKey } from "./tuple.js";

const LegacyCombination = z.object({
    id: z.string(),
    model: z.string(),
    template: z.string(),
    query: z.string(),
    domain: z.string().nullable().optional(),
});

const LegacyResult = z.object({
    prompt: z.string().default(""),
    response: z.string().default(""),
    metadata: z.object({
        template_style: z.string().optional(),
        timestamp: z.number().optional(),
        duration: z.number().optional(),
        simulated: z.boolean().optional(),
    }).prefault({}),
});

const LegacyIdea = z.object({
    title: z.string().default(""),
    description: z.string().default(""),
    text: z.string().default(""),
    source_combinations: z.array(z.string()).default([]),
    metadata: z.object({
        method: z.string().optional(),
        average_score: z.number().optional(),
    }).prefault({}),
});

const LegacyDocument = z.object({
    combinations: z.array(LegacyCombination).default([]),
    results: z.record(z.string(), LegacyResult).default({}),
    evaluations: z.record(z.string(), z.record(z.string(), z.number())).default({}),
    synthesized_ideas: z.record(z.string(), LegacyIdea).default({}),
});

const LEGACY_ERROR_PREFIX = "Error generating response:";

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Bring any supported document shape up to the current version. Documents
 * that already carry the current version are returned untouched.
 */
export function migrateSessionDocument(raw: unknown, now: Date = new Date()): unknown {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new StateIntegrityError("document", "session document must be a JSON object");
    }
    if (!("version" in raw)) {
        return migrateLegacyDocument(raw, now);
    }
    if (raw.version !== SESSION_VERSION) {
        throw new StateIntegrityError("version", `unsupported session document version ${String(raw.version)}`);
    }
    return raw;
}

function migrateLegacyDocument(raw: object, now: Date): SessionDocument {
    const parsed = LegacyDocument.safeParse(raw);
    if (!parsed.success) {
        throw new StateIntegrityError("document", `unreadable legacy session: ${parsed.error.message}`);
    }
    const legacy = parsed.data;
    const timestamp = now.toISOString();

    const models = new Map<string, ModelDescriptor>();
    const instructions = new Map<string, InstructionTemplate>();
    const queries = new Map<string, QueryVariant>();
    const domains = new Map<string, Domain>();
    const combinations: Combination[] = [];
    const resultIdByLegacyId = new Map<string, string>();
    const modelByResultId = new Map<string, string>();

    for (const entry of legacy.combinations) {
        const legacyResult = legacy.results[entry.id];
        const domainId = entry.domain ?? null;

        if (!models.has(entry.model)) {
            models.set(entry.model, {
                id: entry.model,
                name: entry.model,
                provider: inferProviderFromName(entry.model) ?? "simulated",
                model: entry.model,
                parameters: {},
                legacy_placeholder: true,
            });
        }
        if (!instructions.has(entry.template)) {
            const style = legacyResult?.metadata.template_style;
            instructions.set(entry.template, {
                id: entry.template,
                name: entry.template,
                template: "",
                metadata: style ? { cognitive_style: style } : {},
                legacy_placeholder: true,
            });
        }
        if (!queries.has(entry.query)) {
            // The legacy prompt is "<instruction>\n\n<query text>".
            const paragraphs = legacyResult?.prompt.split("\n\n") ?? [];
            queries.set(entry.query, {
                id: entry.query,
                text: paragraphs.length > 1 ? paragraphs[paragraphs.length - 1] : "",
                origin: "base",
                variables: {},
                legacy_placeholder: true,
            });
        }
        if (domainId !== null && !domains.has(domainId)) {
            domains.set(domainId, { id: domainId, name: domainId, description: "", keywords: [], legacy_placeholder: true });
        }

        const id = tupleKey(entry.model, entry.template, entry.query, domainId);
        const combination: Combination = {
            id,
            model_id: entry.model,
            instruction_id: entry.template,
            query_id: entry.query,
            domain_id: domainId,
        };

        if (legacyResult) {
            const failed = legacyResult.response.startsWith(LEGACY_ERROR_PREFIX);
            const result: Result = {
                id: `result_${entry.id}`,
                combination_id: id,
                prompt: legacyResult.prompt,
                text: failed ? "" : legacyResult.response,
                status: failed ? "failed" : "succeeded",
                simulated: legacyResult.metadata.simulated ?? false,
                attempts: 1,
                executed_at: legacyResult.metadata.timestamp !== undefined
                    ? new Date(legacyResult.metadata.timestamp * 1000).toISOString()
                    : timestamp,
                duration_ms: Math.max(0, (legacyResult.metadata.duration ?? 0) * 1000),
            };
            if (failed) result.error = legacyResult.response.slice(LEGACY_ERROR_PREFIX.length).trim();
            combination.result = result;
            resultIdByLegacyId.set(entry.id, result.id);
            modelByResultId.set(result.id, entry.model);

            const evaluation = legacy.evaluations[entry.id];
            if (evaluation) {
                const criteria: Record<string, number> = {};
                for (const [name, value] of Object.entries(evaluation)) {
                    if (name !== "overall") criteria[name] = clamp01(value);
                }
                const score: Score = {
                    result_id: result.id,
                    criteria,
                    aggregate: clamp01(evaluation.overall ?? 0),
                    scoring_revision: 0,
                };
                combination.score = score;
            }
        }
        combinations.push(combination);
    }

    const ideas: SynthesizedIdea[] = [];
    for (const [ideaId, idea] of Object.entries(legacy.synthesized_ideas)) {
        const sourceResultIds = idea.source_combinations
            .map((legacyId) => resultIdByLegacyId.get(legacyId))
            .filter((resultId): resultId is string => resultId !== undefined);
        if (sourceResultIds.length === 0) continue;

        const sourceModels = [...new Set(sourceResultIds.map((resultId) => modelByResultId.get(resultId)))]
            .filter((modelId): modelId is string => modelId !== undefined)
            .sort();
        const contributions: Record<string, number> = {};
        for (const modelId of sourceModels) contributions[modelId] = 1 / sourceModels.length;

        const method = SynthesisMethodName.safeParse(idea.metadata.method);
        ideas.push({
            id: ideaId,
            run: 0,
            title: idea.title,
            text: idea.text || idea.description,
            method: method.success ? method.data : "cluster_based",
            source_cluster_ids: [],
            source_result_ids: sourceResultIds,
            contributions,
            average_score: clamp01(idea.metadata.average_score ?? 0),
            created_at: timestamp,
        });
    }

    return {
        version: SESSION_VERSION,
        session_id: uuidv4(),
        created_at: timestamp,
        updated_at: timestamp,
        run_count: ideas.length > 0 ? 1 : 0,
        catalogs: {
            models: [...models.values()],
            instructions: [...instructions.values()],
            queries: [...queries.values()],
            domains: [...domains.values()],
        },
        combinations,
        clusters: [],
        ideas,
    };
}
