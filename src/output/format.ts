/**
 * Output formatting for synthesized ideas and session summaries.
 */
import type { Combination, SynthesizedIdea } from "../schemas/session.js";

export type OutputFormat = "markdown" | "json";

export interface SessionStats {
    runs: number;
    combinations: number;
    pending: number;
    executed: number;
    succeeded: number;
    failed: number;
    simulated: number;
    scored: number;
    clusters: number;
    ideas: number;
}

export function sessionStats(
    combinations: readonly Combination[],
    clusterCount: number,
    ideaCount: number,
    runs: number,
): SessionStats {
    const stats: SessionStats = {
        runs,
        combinations: combinations.length,
        pending: 0,
        executed: 0,
        succeeded: 0,
        failed: 0,
        simulated: 0,
        scored: 0,
        clusters: clusterCount,
        ideas: ideaCount,
    };
    for (const combination of combinations) {
        const { result } = combination;
        if (!result) {
            stats.pending++;
            continue;
        }
        stats.executed++;
        if (result.status === "succeeded") stats.succeeded++;
        else stats.failed++;
        if (result.simulated) stats.simulated++;
        if (combination.score) stats.scored++;
    }
    return stats;
}

function percent(share: number): string {
    return `${(share * 100).toFixed(1)}%`;
}

export function formatContributions(contributions: Readonly<Record<string, number>>): string {
    return Object.entries(contributions)
        .sort(([a, shareA], [b, shareB]) => shareB - shareA || (a < b ? -1 : a > b ? 1 : 0))
        .map(([modelId, share]) => `${modelId} (${percent(share)})`)
        .join(", ");
}

export function formatIdeasMarkdown(ideas: readonly SynthesizedIdea[]): string {
    if (ideas.length === 0) return "No synthesized ideas to format\n";

    let output = "# Synthesized Ideas\n\n";
    for (const idea of ideas) {
        output += `## ${idea.title}\n\n`;
        output += `${idea.text.trim()}\n\n`;
        output += "### Provenance\n\n";
        output += `- **Method**: ${idea.method}\n`;
        output += `- **Average score**: ${idea.average_score.toFixed(3)}\n`;
        output += `- **Sources**: ${idea.source_result_ids.length} results`;
        output += idea.source_cluster_ids.length > 0 ? ` from ${idea.source_cluster_ids.join(", ")}\n` : "\n";
        output += `- **Contributions**: ${formatContributions(idea.contributions)}\n`;
        output += "\n---\n\n";
    }
    return output;
}

export function formatIdeasJson(ideas: readonly SynthesizedIdea[]): string {
    return JSON.stringify(ideas, null, 2) + "\n";
}

export function formatIdeas(ideas: readonly SynthesizedIdea[], format: OutputFormat): string {
    switch (format) {
        case "markdown":
            return formatIdeasMarkdown(ideas);
        case "json":
            return formatIdeasJson(ideas);
    }
}
