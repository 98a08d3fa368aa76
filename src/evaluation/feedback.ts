/**
 * Feedback — derives the next scoring snapshot from what synthesis selected.
 *
 * Criteria on which the selected Results beat the population gain weight,
 * the others lose it. Criteria evolution adds heuristics that are not yet
 * configured but separate selected Results from the rest. Earlier snapshots
 * and the Scores made with them are never modified.
 */
import { CriterionFunction } from "../schemas/config.js";
import type { FeedbackSettings, ScoringConfig } from "../schemas/config.js";
import type { Result, Score } from "../schemas/session.js";
import { ScoringEngine, normalizeScoringConfig } from "./scoring.js";

/** Floor applied to adjusted weights before renormalization. */
export const MIN_CRITERION_WEIGHT = 0.01;

/** Weight of an evolved criterion, relative to the mean configured weight. */
export const EVOLVED_WEIGHT_FACTOR = 0.5;

export interface ScoredResult {
    result: Result;
    score: Score;
}

export interface FeedbackInput {
    scoring: ScoringConfig;
    settings: FeedbackSettings;
    scored: readonly ScoredResult[];
    /** Results used as sources by the ideas of this run. */
    selectedResultIds: ReadonlySet<string>;
    domainKeywords: readonly string[];
}

export interface FeedbackOutcome {
    scoring: ScoringConfig;
    changed: boolean;
    /** Criteria appended by evolution. */
    added: string[];
}

function meanOf(values: readonly number[]): number {
    return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Mean of selected minus mean of all, for one value per Result. */
function selectionLift(valueOf: (entry: ScoredResult) => number, input: FeedbackInput): number {
    const all = input.scored.map(valueOf);
    const selected = input.scored.filter((entry) => input.selectedResultIds.has(entry.result.id)).map(valueOf);
    return meanOf(selected) - meanOf(all);
}

/** w' = w · (1 + rate · lift), floored at MIN_CRITERION_WEIGHT. Not renormalized. */
export function adjustWeights(input: FeedbackInput): ScoringConfig["criteria"] {
    const rate = input.settings.learning_rate;
    const criteria: ScoringConfig["criteria"] = {};
    for (const [name, criterion] of Object.entries(input.scoring.criteria)) {
        const lift = selectionLift((entry) => entry.score.criteria[name] ?? 0, input);
        criteria[name] = {
            ...criterion,
            weight: Math.max(MIN_CRITERION_WEIGHT, criterion.weight * (1 + rate * lift)),
        };
    }
    return criteria;
}

/**
 * Heuristics no configured criterion uses yet whose values are higher on
 * the selected Results than on the population.
 */
export function evolveCriteria(input: FeedbackInput, criteria: ScoringConfig["criteria"]): ScoringConfig["criteria"] {
    const used = new Set(Object.values(criteria).map((criterion) => criterion.function));
    const weights = Object.values(criteria).map((criterion) => criterion.weight);
    const evolvedWeight = EVOLVED_WEIGHT_FACTOR * meanOf(weights);
    const results = input.scored.map((entry) => entry.result);

    const evolved: ScoringConfig["criteria"] = {};
    for (const fn of CriterionFunction.options) {
        if (used.has(fn)) continue;
        const scorer = new ScoringEngine({
            revision: 0,
            criteria: { [fn]: { description: "", weight: 1, function: fn } },
        });
        const values = scorer.scoreAll(results, input.domainKeywords);
        const lift = selectionLift((entry) => values.get(entry.result.id)?.criteria[fn] ?? 0, input);
        if (lift <= 0) continue;

        const name = fn in criteria ? `${fn}_evolved` : fn;
        evolved[name] = {
            description: `Added by feedback: selected results scored ${lift.toFixed(3)} higher on ${fn}.`,
            weight: evolvedWeight,
            function: fn,
        };
    }
    return evolved;
}

export function applyFeedback(input: FeedbackInput): FeedbackOutcome {
    const { settings } = input;
    const enabled = settings.weights_adjustment || settings.criteria_evolution;
    if (!enabled || input.selectedResultIds.size === 0 || input.scored.length === 0) {
        return { scoring: input.scoring, changed: false, added: [] };
    }

    let criteria = settings.weights_adjustment ? adjustWeights(input) : { ...input.scoring.criteria };
    let added: string[] = [];
    if (settings.criteria_evolution) {
        const evolved = evolveCriteria(input, criteria);
        added = Object.keys(evolved);
        criteria = { ...criteria, ...evolved };
    }

    const scoring = normalizeScoringConfig({ revision: input.scoring.revision + 1, criteria });
    return { scoring, changed: true, added };
}
