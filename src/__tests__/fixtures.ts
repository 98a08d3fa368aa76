/**
 * Shared builders for catalog entries and results used across test suites.
 */
import type { Domain, InstructionTemplate, ModelDescriptor, QueryVariant } from "../schemas/catalog.js";
import type { Result } from "../schemas/session.js";

export const FIXED_NOW = new Date("2025-01-01T00:00:00.000Z");

export function fixedClock(): Date {
    return new Date(FIXED_NOW.getTime());
}

export function makeModel(id: string, provider: ModelDescriptor["provider"] = "simulated"): ModelDescriptor {
    return { id, name: id, provider, model: id, parameters: { temperature: 0.7, max_tokens: 500 } };
}

export function makeInstruction(id: string, template = "Answer as an expert in {domain}.", style?: string): InstructionTemplate {
    return { id, name: id, template, metadata: style ? { cognitive_style: style } : {} };
}

export function makeQuery(id: string, text = "How might we reduce food waste?"): QueryVariant {
    return { id, text, origin: "base", variables: {} };
}

export function makeDomain(id: string, keywords: string[] = ["logistics", "supply"]): Domain {
    return { id, name: id, description: `${id} systems`, keywords };
}

export function makeResult(overrides: Partial<Result> & Pick<Result, "id" | "combination_id">): Result {
    return {
        prompt: "prompt",
        text: "A response.",
        status: "succeeded",
        simulated: false,
        attempts: 1,
        executed_at: FIXED_NOW.toISOString(),
        duration_ms: 10,
        ...overrides,
    };
}
