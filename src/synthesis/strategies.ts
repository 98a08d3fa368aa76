/**
 * Synthesis strategies. Each returns idea drafts with provenance; ids and
 * timestamps are assigned by `synthesize`.
 */
import type { Cluster } from "../schemas/session.js";
import { averageScore, sharesByCount, sharesByScore, sharesEvenly } from "./contributions.js";
import type { IdeaDraft, SourceResult, SynthesisInput, SynthesisMethod } from "./types.js";

type MethodOf<K extends SynthesisMethod["kind"]> = Extract<SynthesisMethod, { kind: K }>;

interface Group {
    cluster?: Cluster;
    members: SourceResult[];
}

/** Members of a cluster that are available as sources, best first. */
function membersOf(cluster: Cluster, sources: readonly SourceResult[]): SourceResult[] {
    const ids = new Set(cluster.member_result_ids);
    return sources.filter((source) => ids.has(source.result.id));
}

function clustersContaining(clusters: readonly Cluster[], picked: readonly SourceResult[]): Cluster[] {
    const ids = new Set(picked.map((source) => source.result.id));
    return clusters.filter((cluster) => cluster.member_result_ids.some((id) => ids.has(id)));
}

/** One idea per cluster from its best members. */
export async function synthesizeClusterBased(
    input: SynthesisInput,
    method: MethodOf<"cluster_based">,
): Promise<IdeaDraft[]> {
    const drafts: IdeaDraft[] = [];
    for (const cluster of input.clusters) {
        const picked = membersOf(cluster, input.sources).slice(0, method.maxSources);
        if (picked.length === 0) continue;
        const composed = await input.composer.compose({
            method: "cluster_based",
            sources: picked,
            labels: [cluster.label],
        });
        drafts.push({
            ...composed,
            method: "cluster_based",
            source_cluster_ids: [cluster.id],
            source_result_ids: picked.map((source) => source.result.id),
            contributions: sharesByScore(picked),
            average_score: averageScore(picked),
        });
    }
    return drafts;
}

/**
 * One idea from the best member of each of the strongest groups, at least
 * two of them whatever `maxSources` says. The representatives must come from
 * at least two models. Otherwise the weakest representative is replaced by a
 * member from another model, looked for first in its own group, then in the
 * groups left out, then among all sources. When no such member exists
 * nothing is produced.
 */
export async function synthesizeCrossPollination(
    input: SynthesisInput,
    method: MethodOf<"cross_pollination">,
): Promise<IdeaDraft[]> {
    const count = Math.max(2, method.maxSources);
    let groups: Group[] = input.clusters
        .map((cluster) => ({ cluster, members: membersOf(cluster, input.sources) }))
        .filter((group) => group.members.length > 0);
    if (groups.length < 2) {
        groups = input.sources.slice(0, count).map((source) => ({ members: [source] }));
    }
    groups = groups
        .map((group, order) => ({ group, order }))
        .sort((a, b) => b.group.members[0].score - a.group.members[0].score || a.order - b.order)
        .map((entry) => entry.group);

    const chosen = groups.slice(0, count);
    const representatives = chosen.map((group) => group.members[0]);
    if (representatives.length < 2) return [];

    const models = new Set(representatives.map((source) => source.modelId));
    if (models.size < 2) {
        const onlyModel = representatives[0].modelId;
        const used = new Set(representatives.map((source) => source.result.id));
        const candidates = [
            ...chosen[chosen.length - 1].members,
            ...groups.slice(count).flatMap((group) => group.members),
            ...input.sources,
        ];
        const alternative = candidates.find((source) => source.modelId !== onlyModel && !used.has(source.result.id));
        if (!alternative) return [];
        representatives[representatives.length - 1] = alternative;
    }

    const composed = await input.composer.compose({
        method: "cross_pollination",
        sources: representatives,
        labels: clustersContaining(input.clusters, representatives).map((cluster) => cluster.label),
    });
    return [{
        ...composed,
        method: "cross_pollination",
        source_cluster_ids: clustersContaining(input.clusters, representatives).map((cluster) => cluster.id),
        source_result_ids: representatives.map((source) => source.result.id),
        contributions: method.blending === "score_weighted" ? sharesByScore(representatives) : sharesEvenly(representatives),
        average_score: averageScore(representatives),
    }];
}

/**
 * The best Result refined over `rounds` rounds, each taking the next best
 * Result as critique input.
 */
export async function synthesizeRefinement(
    input: SynthesisInput,
    method: MethodOf<"refinement">,
): Promise<IdeaDraft[]> {
    const best = input.sources[0];
    if (!best) return [];

    const labels = clustersContaining(input.clusters, [best]).map((cluster) => cluster.label);
    let draft = await input.composer.compose({ method: "refinement", sources: [best], labels });
    const inputs: SourceResult[] = [best];
    for (let round = 1; round <= method.rounds; round++) {
        const critique = input.sources[round];
        if (!critique) break;
        draft = await input.composer.compose({ method: "refinement", sources: [best], labels, draft, critique });
        inputs.push(critique);
    }

    const contributions = inputs.some((source) => source.score === 0)
        ? sharesByCount(inputs)
        : sharesByScore(inputs);
    return [{
        ...draft,
        method: "refinement",
        source_cluster_ids: clustersContaining(input.clusters, inputs).map((cluster) => cluster.id),
        source_result_ids: inputs.map((source) => source.result.id),
        contributions,
        average_score: averageScore(inputs),
    }];
}
