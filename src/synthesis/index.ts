/**
 * Synthesis Module — turns clustered Results into SynthesizedIdeas with
 * model-contribution provenance.
 */
import type { ExtractionSettings, SynthesisMethodName } from "../schemas/config.js";
import type { SynthesizedIdea } from "../schemas/session.js";
import { synthesizeClusterBased, synthesizeCrossPollination, synthesizeRefinement } from "./strategies.js";
import type { IdeaDraft, SynthesisInput, SynthesisMethod } from "./types.js";

export * from "./types.js";
export * from "./contributions.js";
export * from "./composer.js";
export * from "./strategies.js";

/** The configured form of a method name. */
export function methodFromSettings(name: SynthesisMethodName, settings: ExtractionSettings): SynthesisMethod {
    switch (name) {
        case "cluster_based":
            return { kind: "cluster_based", maxSources: settings.max_sources };
        case "cross_pollination":
            return {
                kind: "cross_pollination",
                blending: settings.cross_pollination.blending,
                maxSources: settings.max_sources,
            };
        case "refinement":
            return { kind: "refinement", rounds: settings.refinement.rounds };
    }
}

function runStrategy(input: SynthesisInput, method: SynthesisMethod): Promise<IdeaDraft[]> {
    switch (method.kind) {
        case "cluster_based":
            return synthesizeClusterBased(input, method);
        case "cross_pollination":
            return synthesizeCrossPollination(input, method);
        case "refinement":
            return synthesizeRefinement(input, method);
        default: {
            const unknown: never = method;
            throw new Error(`Unknown synthesis method: ${JSON.stringify(unknown)}`);
        }
    }
}

export async function synthesize(input: SynthesisInput, method: SynthesisMethod): Promise<SynthesizedIdea[]> {
    const drafts = await runStrategy(input, method);
    const createdAt = (input.clock ?? (() => new Date()))().toISOString();
    return drafts.map((draft, index) => ({
        id: `idea_${input.run}_${input.firstIdeaNumber + index}`,
        run: input.run,
        ...draft,
        created_at: createdAt,
    }));
}
