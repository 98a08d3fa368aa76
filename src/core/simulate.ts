/**
 * Simulated responses — stand-in text for runs without live model access.
 * The same combination always yields the same text.
 */
import { createHash } from "crypto";
import type { Domain, InstructionTemplate, ModelDescriptor, QueryVariant } from "../schemas/catalog.js";

const SIMULATED_IDEA_COUNT = 3;

function pick<T>(items: readonly T[], seed: string): T {
    const digest = createHash("sha256").update(seed).digest();
    return items[digest.readUInt32BE(0) % items.length];
}

export interface SimulationInput {
    combinationId: string;
    model: ModelDescriptor;
    instruction: InstructionTemplate;
    query: QueryVariant;
    domain: Domain | null;
}

export function simulateResponse(input: SimulationInput): string {
    const { combinationId, model, instruction, query, domain } = input;
    const style = instruction.metadata.cognitive_style || instruction.name || "default";
    const domainName = domain ? domain.name : "General";

    const parts = [
        `This is a simulated response from ${model.name} using the ${style} approach.`,
        `Domain: ${domainName}`,
        `The query was: ${query.text}`,
        "Here are some ideas that address this challenge:",
    ];
    for (let i = 1; i <= SIMULATED_IDEA_COUNT; i++) {
        if (domain && domain.keywords.length > 0) {
            const keyword = pick(domain.keywords, `${combinationId}#${i}`);
            parts.push(`Idea ${i}: A solution involving ${keyword} that addresses the core challenge.`);
        } else {
            parts.push(`Idea ${i}: A novel approach to solving this problem.`);
        }
    }
    parts.push(`These ideas represent a ${style} approach to the problem within the ${domainName} domain.`);
    return parts.join("\n\n");
}
