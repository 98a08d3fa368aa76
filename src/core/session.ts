/**
 * Session State — the single persisted record of an exploration session.
 *
 * Every mutation goes through this class so the document invariants hold
 * after each call: unique tuples, one Result per Combination, Scores and
 * cluster members pointing at existing Results, idea shares summing to 1.
 * Persistence is one JSON document; `serialize()` is canonical, so a
 * document written by `save()` loads and re-saves byte for byte.
 */
import fs from "fs/promises";
import path from "path";
import { isDeepStrictEqual } from "util";
import { v4 as uuidv4 } from "uuid";
import { SESSION_VERSION, SessionDocument } from "../schemas/session.js";
import type {
    Cluster,
    Combination,
    Result,
    Score,
    SynthesizedIdea,
} from "../schemas/session.js";
import type { Catalogs, Domain, InstructionTemplate, ModelDescriptor, QueryVariant } from "../schemas/catalog.js";
import type { ScoringConfig } from "../schemas/config.js";
import { ConfigurationError, StateIntegrityError } from "../errors/index.js";
import { migrateSessionDocument } from "./migrate.js";
import { NO_DOMAIN, tupleKey } from "./tuple.js";

/** A combination as produced by the generator, before it has a Result. */
export interface NewCombination {
    model_id: string;
    instruction_id: string;
    query_id: string;
    domain_id: string | null;
}

export interface SessionStateOptions {
    clock?: () => Date;
}

type CatalogKind = keyof Catalogs;

const CATALOG_KINDS: readonly CatalogKind[] = ["models", "instructions", "queries", "domains"];

const SHARE_TOLERANCE = 1e-6;

/**
 * Check every cross-reference of a parsed document. Throws
 * StateIntegrityError naming the first offending identifier.
 */
export function validateIntegrity(doc: SessionDocument): void {
    const catalogIds: Record<CatalogKind, Set<string>> = {
        models: new Set(),
        instructions: new Set(),
        queries: new Set(),
        domains: new Set(),
    };
    for (const kind of CATALOG_KINDS) {
        for (const entry of doc.catalogs[kind]) {
            if (catalogIds[kind].has(entry.id)) {
                throw new StateIntegrityError(`${kind}.${entry.id}`, "duplicate catalog id");
            }
            catalogIds[kind].add(entry.id);
        }
    }
    if (catalogIds.domains.has(NO_DOMAIN)) {
        throw new StateIntegrityError(`domains.${NO_DOMAIN}`, "domain id is reserved");
    }

    const clusterIds = new Set<string>();
    for (const cluster of doc.clusters) {
        if (clusterIds.has(cluster.id)) {
            throw new StateIntegrityError(`clusters.${cluster.id}`, "duplicate cluster id");
        }
        clusterIds.add(cluster.id);
    }

    const combinationIds = new Set<string>();
    const modelByResultId = new Map<string, string>();
    for (const combination of doc.combinations) {
        const { id } = combination;
        if (combinationIds.has(id)) {
            throw new StateIntegrityError(id, "duplicate combination tuple");
        }
        combinationIds.add(id);

        const expected = tupleKey(
            combination.model_id,
            combination.instruction_id,
            combination.query_id,
            combination.domain_id,
        );
        if (id !== expected) {
            throw new StateIntegrityError(id, `combination id does not match its tuple "${expected}"`);
        }
        if (!catalogIds.models.has(combination.model_id)) {
            throw new StateIntegrityError(id, `unknown model "${combination.model_id}"`);
        }
        if (!catalogIds.instructions.has(combination.instruction_id)) {
            throw new StateIntegrityError(id, `unknown instruction "${combination.instruction_id}"`);
        }
        if (!catalogIds.queries.has(combination.query_id)) {
            throw new StateIntegrityError(id, `unknown query "${combination.query_id}"`);
        }
        if (combination.domain_id !== null && !catalogIds.domains.has(combination.domain_id)) {
            throw new StateIntegrityError(id, `unknown domain "${combination.domain_id}"`);
        }

        const { result, score } = combination;
        if (result) {
            if (result.combination_id !== id) {
                throw new StateIntegrityError(result.id, `result belongs to "${result.combination_id}", not "${id}"`);
            }
            if (modelByResultId.has(result.id)) {
                throw new StateIntegrityError(result.id, "duplicate result id");
            }
            modelByResultId.set(result.id, combination.model_id);
        }
        if (score && (!result || score.result_id !== result.id)) {
            throw new StateIntegrityError(id, "score does not reference this combination's result");
        }
        if (combination.cluster_id !== undefined && !clusterIds.has(combination.cluster_id)) {
            throw new StateIntegrityError(id, `unknown cluster "${combination.cluster_id}"`);
        }
    }

    for (const cluster of doc.clusters) {
        for (const resultId of cluster.member_result_ids) {
            if (!modelByResultId.has(resultId)) {
                throw new StateIntegrityError(cluster.id, `unknown member result "${resultId}"`);
            }
        }
    }

    const ideaIds = new Set<string>();
    for (const idea of doc.ideas) {
        if (ideaIds.has(idea.id)) {
            throw new StateIntegrityError(idea.id, "duplicate idea id");
        }
        ideaIds.add(idea.id);

        const sourceModels = new Set<string>();
        for (const resultId of idea.source_result_ids) {
            const modelId = modelByResultId.get(resultId);
            if (modelId === undefined) {
                throw new StateIntegrityError(idea.id, `unknown source result "${resultId}"`);
            }
            sourceModels.add(modelId);
        }
        for (const clusterId of idea.source_cluster_ids) {
            if (!clusterIds.has(clusterId)) {
                throw new StateIntegrityError(idea.id, `unknown source cluster "${clusterId}"`);
            }
        }

        const shareModels = Object.keys(idea.contributions);
        if (shareModels.length !== sourceModels.size || !shareModels.every((m) => sourceModels.has(m))) {
            throw new StateIntegrityError(idea.id, "contributions must cover exactly the source models");
        }
        const total = Object.values(idea.contributions).reduce((sum, share) => sum + share, 0);
        if (Math.abs(total - 1) > SHARE_TOLERANCE) {
            throw new StateIntegrityError(idea.id, `contribution shares sum to ${total}, expected 1`);
        }
    }
}

export class SessionState {
    private doc: SessionDocument;
    private readonly clock: () => Date;

    private constructor(doc: SessionDocument, options: SessionStateOptions = {}) {
        this.doc = doc;
        this.clock = options.clock ?? (() => new Date());
    }

    /** A fresh, empty session. */
    static create(options: SessionStateOptions & { sessionId?: string } = {}): SessionState {
        const now = (options.clock ?? (() => new Date()))().toISOString();
        return new SessionState(
            {
                version: SESSION_VERSION,
                session_id: options.sessionId ?? uuidv4(),
                created_at: now,
                updated_at: now,
                run_count: 0,
                catalogs: { models: [], instructions: [], queries: [], domains: [] },
                combinations: [],
                clusters: [],
                ideas: [],
            },
            options,
        );
    }

    /** Migrate, validate and adopt a raw (already JSON-parsed) document. */
    static fromDocument(raw: unknown, options: SessionStateOptions = {}): SessionState {
        const now = (options.clock ?? (() => new Date()))();
        const parsed = SessionDocument.safeParse(migrateSessionDocument(raw, now));
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue ? issue.path.join(".") || "document" : "document";
            throw new StateIntegrityError(where, issue ? issue.message : "malformed session document");
        }
        validateIntegrity(parsed.data);
        return new SessionState(parsed.data, options);
    }

    /** Read a session document from disk. */
    static async load(filePath: string, options: SessionStateOptions = {}): Promise<SessionState> {
        const content = await fs.readFile(filePath, "utf-8");
        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (err) {
            throw new StateIntegrityError(filePath, `not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
        }
        return SessionState.fromDocument(raw, options);
    }

    /** Write the canonical document, creating parent directories as needed. */
    async save(filePath: string): Promise<void> {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, this.serialize(), "utf-8");
    }

    /** Canonical JSON: schema key order, 2-space indent, trailing newline. */
    serialize(): string {
        return JSON.stringify(this.toDocument(), null, 2) + "\n";
    }

    /** A detached, canonical copy of the document. */
    toDocument(): SessionDocument {
        return SessionDocument.parse(this.doc);
    }

    get sessionId(): string {
        return this.doc.session_id;
    }

    get runCount(): number {
        return this.doc.run_count;
    }

    get catalogs(): Readonly<Catalogs> {
        return this.doc.catalogs;
    }

    get combinations(): readonly Combination[] {
        return this.doc.combinations;
    }

    get clusters(): readonly Cluster[] {
        return this.doc.clusters;
    }

    get ideas(): readonly SynthesizedIdea[] {
        return this.doc.ideas;
    }

    /** The scoring snapshot the last run used, if any. */
    get scoring(): ScoringConfig | undefined {
        return this.doc.scoring;
    }

    model(id: string): ModelDescriptor | undefined {
        return this.doc.catalogs.models.find((entry) => entry.id === id);
    }

    instruction(id: string): InstructionTemplate | undefined {
        return this.doc.catalogs.instructions.find((entry) => entry.id === id);
    }

    query(id: string): QueryVariant | undefined {
        return this.doc.catalogs.queries.find((entry) => entry.id === id);
    }

    domain(id: string): Domain | undefined {
        return this.doc.catalogs.domains.find((entry) => entry.id === id);
    }

    combination(id: string): Combination | undefined {
        return this.doc.combinations.find((entry) => entry.id === id);
    }

    findByResultId(resultId: string): Combination | undefined {
        return this.doc.combinations.find((entry) => entry.result?.id === resultId);
    }

    tupleKeys(): Set<string> {
        return new Set(this.doc.combinations.map((entry) => entry.id));
    }

    /** Combinations without a Result, in insertion order. */
    pending(): Combination[] {
        return this.doc.combinations.filter((entry) => !entry.result);
    }

    /** Succeeded or failed, every combination that has a Result. */
    executed(): Combination[] {
        return this.doc.combinations.filter((entry) => entry.result !== undefined);
    }

    registerModels(models: readonly ModelDescriptor[]): void {
        this.registerCatalogEntries("models", this.doc.catalogs.models, models, (entry, id) => entry.model_id === id);
    }

    registerInstructions(instructions: readonly InstructionTemplate[]): void {
        this.registerCatalogEntries(
            "instructions",
            this.doc.catalogs.instructions,
            instructions,
            (entry, id) => entry.instruction_id === id,
        );
    }

    registerQueries(queries: readonly QueryVariant[]): void {
        this.registerCatalogEntries("queries", this.doc.catalogs.queries, queries, (entry, id) => entry.query_id === id);
    }

    registerDomains(domains: readonly Domain[]): void {
        for (const domain of domains) {
            if (domain.id === NO_DOMAIN) {
                throw new ConfigurationError(`domains.${NO_DOMAIN}`, "domain id is reserved for ungrounded combinations");
            }
        }
        this.registerCatalogEntries("domains", this.doc.catalogs.domains, domains, (entry, id) => entry.domain_id === id);
    }

    /**
     * Add new combinations. Tuples already present are skipped, so
     * regenerating against the same session never duplicates. Returns the
     * combinations actually added.
     */
    addCombinations(entries: readonly NewCombination[]): Combination[] {
        const existing = this.tupleKeys();
        const added: Combination[] = [];
        for (const entry of entries) {
            const id = tupleKey(entry.model_id, entry.instruction_id, entry.query_id, entry.domain_id);
            if (existing.has(id)) continue;
            this.assertCatalogReference(id, entry);
            const combination: Combination = {
                id,
                model_id: entry.model_id,
                instruction_id: entry.instruction_id,
                query_id: entry.query_id,
                domain_id: entry.domain_id,
            };
            existing.add(id);
            added.push(combination);
        }
        if (added.length > 0) {
            this.doc.combinations.push(...added);
            this.touch();
        }
        return added;
    }

    /**
     * Attach a Result to its Combination. A Combination is executed exactly
     * once; recording a second Result is a StateIntegrityError.
     */
    recordResult(result: Result): void {
        const index = this.indexOf(result.combination_id);
        const combination = this.doc.combinations[index];
        if (combination.result) {
            throw new StateIntegrityError(combination.id, "combination already has a result");
        }
        if (this.findByResultId(result.id)) {
            throw new StateIntegrityError(result.id, "duplicate result id");
        }
        this.doc.combinations[index] = { ...combination, result };
        this.touch();
    }

    /**
     * Drop a Combination's Result so it runs again. Its Score and cluster
     * membership go with it, and ideas built from it are removed.
     */
    clearResult(combinationId: string): void {
        const index = this.indexOf(combinationId);
        const combination = this.doc.combinations[index];
        const resultId = combination.result?.id;
        if (resultId === undefined) return;

        this.doc.combinations[index] = {
            id: combination.id,
            model_id: combination.model_id,
            instruction_id: combination.instruction_id,
            query_id: combination.query_id,
            domain_id: combination.domain_id,
        };

        const survivingClusters: Cluster[] = [];
        const removedClusterIds = new Set<string>();
        for (const cluster of this.doc.clusters) {
            const members = cluster.member_result_ids.filter((id) => id !== resultId);
            if (members.length === 0) {
                removedClusterIds.add(cluster.id);
            } else {
                survivingClusters.push({ ...cluster, member_result_ids: members });
            }
        }
        this.doc.clusters = survivingClusters;

        this.doc.ideas = this.doc.ideas
            .filter((idea) => !idea.source_result_ids.includes(resultId))
            .map((idea) => ({
                ...idea,
                source_cluster_ids: idea.source_cluster_ids.filter((id) => !removedClusterIds.has(id)),
            }));

        if (removedClusterIds.size > 0) {
            this.doc.combinations = this.doc.combinations.map((entry) => {
                if (entry.cluster_id === undefined || !removedClusterIds.has(entry.cluster_id)) return entry;
                return {
                    id: entry.id,
                    model_id: entry.model_id,
                    instruction_id: entry.instruction_id,
                    query_id: entry.query_id,
                    domain_id: entry.domain_id,
                    result: entry.result,
                    score: entry.score,
                };
            });
        }
        this.touch();
    }

    /** Attach Scores to the Combinations owning their Results. */
    recordScores(scores: Iterable<Score>): void {
        for (const score of scores) {
            const combination = this.findByResultId(score.result_id);
            if (!combination) {
                throw new StateIntegrityError(score.result_id, "score references an unknown result");
            }
            const index = this.indexOf(combination.id);
            this.doc.combinations[index] = { ...combination, score };
        }
        this.touch();
    }

    /** Store the scoring snapshot used from now on. */
    setScoring(config: ScoringConfig): void {
        this.doc.scoring = config;
        this.touch();
    }

    /** Start a new pipeline run and return its index (0-based). */
    beginRun(): number {
        const run = this.doc.run_count;
        this.doc.run_count = run + 1;
        this.touch();
        return run;
    }

    /**
     * Append clusters. Each member Combination points at the newest cluster
     * containing it.
     */
    addClusters(clusters: readonly Cluster[]): void {
        const known = new Set(this.doc.clusters.map((cluster) => cluster.id));
        const clusterByResult = new Map<string, string>();
        for (const cluster of clusters) {
            if (known.has(cluster.id)) {
                throw new StateIntegrityError(cluster.id, "duplicate cluster id");
            }
            known.add(cluster.id);
            for (const resultId of cluster.member_result_ids) {
                if (!this.findByResultId(resultId)) {
                    throw new StateIntegrityError(cluster.id, `unknown member result "${resultId}"`);
                }
                clusterByResult.set(resultId, cluster.id);
            }
        }
        this.doc.clusters.push(...clusters);
        this.doc.combinations = this.doc.combinations.map((entry) => {
            const clusterId = entry.result ? clusterByResult.get(entry.result.id) : undefined;
            return clusterId === undefined ? entry : { ...entry, cluster_id: clusterId };
        });
        this.touch();
    }

    /** Append ideas after checking their provenance against this session. */
    addIdeas(ideas: readonly SynthesizedIdea[]): void {
        const candidate = SessionDocument.parse({
            ...this.doc,
            ideas: [...this.doc.ideas, ...ideas],
        });
        validateIntegrity(candidate);
        this.doc.ideas.push(...ideas);
        this.touch();
    }

    private registerCatalogEntries<T extends { id: string; legacy_placeholder?: true }>(
        kind: CatalogKind,
        catalog: T[],
        entries: readonly T[],
        references: (combination: Combination, id: string) => boolean,
    ): void {
        let changed = false;
        for (const entry of entries) {
            const index = catalog.findIndex((existing) => existing.id === entry.id);
            if (index === -1) {
                catalog.push(entry);
                changed = true;
                continue;
            }
            if (isDeepStrictEqual(catalog[index], entry)) continue;
            const referenced = this.doc.combinations.some((combination) => references(combination, entry.id));
            if (referenced && !catalog[index].legacy_placeholder) {
                throw new ConfigurationError(
                    `${kind}.${entry.id}`,
                    "is referenced by existing combinations and cannot change",
                );
            }
            catalog[index] = entry;
            changed = true;
        }
        if (changed) this.touch();
    }

    private assertCatalogReference(id: string, entry: NewCombination): void {
        if (!this.model(entry.model_id)) {
            throw new StateIntegrityError(id, `unknown model "${entry.model_id}"`);
        }
        if (!this.instruction(entry.instruction_id)) {
            throw new StateIntegrityError(id, `unknown instruction "${entry.instruction_id}"`);
        }
        if (!this.query(entry.query_id)) {
            throw new StateIntegrityError(id, `unknown query "${entry.query_id}"`);
        }
        if (entry.domain_id !== null && !this.domain(entry.domain_id)) {
            throw new StateIntegrityError(id, `unknown domain "${entry.domain_id}"`);
        }
    }

    private indexOf(combinationId: string): number {
        const index = this.doc.combinations.findIndex((entry) => entry.id === combinationId);
        if (index === -1) {
            throw new StateIntegrityError(combinationId, "unknown combination");
        }
        return index;
    }

    private touch(): void {
        this.doc.updated_at = this.clock().toISOString();
    }
}
