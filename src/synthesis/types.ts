import type { Cluster, Result, SynthesizedIdea } from "../schemas/session.js";
import type { SynthesisMethodName } from "../schemas/config.js";

/** How ideas are built; each kind carries only the settings it reads. */
export type SynthesisMethod =
    | { kind: "cluster_based"; maxSources: number }
    | { kind: "cross_pollination"; blending: "even" | "score_weighted"; maxSources: number }
    | { kind: "refinement"; rounds: number };

/** A scored, succeeded Result available to synthesis. */
export interface SourceResult {
    result: Result;
    modelId: string;
    /** Aggregate score. */
    score: number;
}

export interface ComposeRequest {
    method: SynthesisMethodName;
    sources: readonly SourceResult[];
    /** Cluster labels the sources were drawn from. */
    labels: readonly string[];
    /** Refinement only: the draft being improved. */
    draft?: ComposedIdea;
    /** Refinement only: the Result used as critique input. */
    critique?: SourceResult;
}

export interface ComposedIdea {
    title: string;
    text: string;
}

/** Turns source texts into an idea's title and body. */
export interface IdeaComposer {
    compose(request: ComposeRequest): Promise<ComposedIdea>;
}

export interface SynthesisInput {
    /** Clusters of the current run. */
    clusters: readonly Cluster[];
    /** Candidate Results, best score first. */
    sources: readonly SourceResult[];
    composer: IdeaComposer;
    run: number;
    /** Number appended to the first idea id; ids are `idea_<run>_<n>`. */
    firstIdeaNumber: number;
    clock?: () => Date;
}

/** An idea before it is given an id, a run and a timestamp. */
export type IdeaDraft = Omit<SynthesizedIdea, "id" | "run" | "created_at">;
