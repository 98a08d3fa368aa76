/**
 * Combination Generator — picks which (model, instruction, query, domain)
 * tuples to run next.
 *
 * Enumeration order is fixed: models outer, then instructions, queries,
 * domain slots. Balanced sampling spreads the budget evenly over models and,
 * within a model, rotates over instructions so no instruction is starved.
 */
import type { Domain, InstructionTemplate, ModelDescriptor, QueryVariant } from "../schemas/catalog.js";
import { ConfigurationError } from "../errors/index.js";
import type { NewCombination } from "./session.js";
import { tupleKey } from "./tuple.js";

export interface GeneratorInput {
    models: readonly ModelDescriptor[];
    instructions: readonly InstructionTemplate[];
    queries: readonly QueryVariant[];
    /** `null` is the "no domain" slot. */
    domains: readonly (Domain | null)[];
    maxCombinations: number;
    balanced: boolean;
    /** Tuple keys already in the session; these are never produced again. */
    existing?: ReadonlySet<string>;
}

interface Pair {
    queryId: string;
    domainId: string | null;
}

function toCombination(modelId: string, instructionId: string, pair: Pair): NewCombination {
    return {
        model_id: modelId,
        instruction_id: instructionId,
        query_id: pair.queryId,
        domain_id: pair.domainId,
    };
}

function keyOf(entry: NewCombination): string {
    return tupleKey(entry.model_id, entry.instruction_id, entry.query_id, entry.domain_id);
}

function validateInput(input: GeneratorInput): void {
    if (input.models.length === 0) throw new ConfigurationError("models", "at least one model is required");
    if (input.instructions.length === 0) {
        throw new ConfigurationError("instructions", "at least one instruction template is required");
    }
    if (input.queries.length === 0) throw new ConfigurationError("queries", "at least one query is required");
    if (input.domains.length === 0) {
        throw new ConfigurationError("domains", "at least one domain slot is required (use null for no domain)");
    }
    if (!Number.isInteger(input.maxCombinations) || input.maxCombinations < 1) {
        throw new ConfigurationError("max_combinations", "must be a positive integer");
    }
}

/**
 * Candidates for one model in balanced order: round r gives instruction i
 * the pair (r + i) mod |pairs|, so consecutive picks move across both
 * instructions and queries. Existing tuples are skipped.
 */
function balancedCandidates(
    modelId: string,
    instructions: readonly InstructionTemplate[],
    pairs: readonly Pair[],
    existing: ReadonlySet<string>,
): NewCombination[] {
    const ordered: NewCombination[] = [];
    for (let round = 0; round < pairs.length; round++) {
        for (let i = 0; i < instructions.length; i++) {
            const entry = toCombination(modelId, instructions[i].id, pairs[(round + i) % pairs.length]);
            if (!existing.has(keyOf(entry))) ordered.push(entry);
        }
    }
    return ordered;
}

/**
 * Select new combinations within `maxCombinations`.
 *
 * - Fewer candidates than the budget: all of them, in enumeration order.
 * - Unbalanced: the enumeration truncated to the budget.
 * - Balanced: each model gets ⌊budget / models⌋ (the first models one more
 *   for the remainder); quota a model cannot use is handed out one slot at a
 *   time, in model order, to models that still have candidates.
 */
export function generateCombinations(input: GeneratorInput): NewCombination[] {
    validateInput(input);
    const existing = input.existing ?? new Set<string>();

    const pairs: Pair[] = [];
    for (const query of input.queries) {
        for (const domain of input.domains) {
            pairs.push({ queryId: query.id, domainId: domain ? domain.id : null });
        }
    }

    const all: NewCombination[] = [];
    for (const model of input.models) {
        for (const instruction of input.instructions) {
            for (const pair of pairs) {
                const entry = toCombination(model.id, instruction.id, pair);
                if (!existing.has(keyOf(entry))) all.push(entry);
            }
        }
    }

    const budget = input.maxCombinations;
    if (all.length <= budget) return all;
    if (!input.balanced) return all.slice(0, budget);

    const perModel = input.models.map((model) =>
        balancedCandidates(model.id, input.instructions, pairs, existing),
    );
    const base = Math.floor(budget / input.models.length);
    const remainder = budget % input.models.length;
    const taken = perModel.map((candidates, index) =>
        Math.min(candidates.length, base + (index < remainder ? 1 : 0)),
    );

    let spare = budget - taken.reduce((sum, count) => sum + count, 0);
    while (spare > 0) {
        let progressed = false;
        for (let index = 0; index < perModel.length && spare > 0; index++) {
            if (taken[index] < perModel[index].length) {
                taken[index]++;
                spare--;
                progressed = true;
            }
        }
        if (!progressed) break;
    }

    return perModel.flatMap((candidates, index) => candidates.slice(0, taken[index]));
}
