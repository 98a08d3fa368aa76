/**
 * Prompt resolution — turns a Combination into the request text sent to a
 * model: the filled instruction, a blank line, then the query.
 */
import type { Domain, InstructionTemplate, QueryVariant } from "../schemas/catalog.js";

/** Stands in for `{domain}` when a combination has no domain grounding. */
export const GENERIC_DOMAIN_PHRASE = "any field or context you find relevant";

const PLACEHOLDER = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

/**
 * Replace `{name}` markers with values. Markers without a value are left
 * as written.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
    return template.replace(PLACEHOLDER, (marker, name: string) =>
        Object.prototype.hasOwnProperty.call(values, name) ? values[name] : marker,
    );
}

/** Placeholder values for a combination. Domain values win over query variables. */
export function templateValues(query: QueryVariant, domain: Domain | null): Record<string, string> {
    const values: Record<string, string> = { ...query.variables };
    if (domain) {
        values.domain = domain.description || domain.name;
        values.domain_name = domain.name;
        values.keywords = domain.keywords.join(", ");
    } else {
        values.domain = GENERIC_DOMAIN_PHRASE;
        values.domain_name = "general";
        values.keywords = "";
    }
    return values;
}

export function buildPrompt(
    instruction: InstructionTemplate,
    query: QueryVariant,
    domain: Domain | null,
): string {
    const values = templateValues(query, domain);
    const resolvedInstruction = fillTemplate(instruction.template, values).trim();
    const resolvedQuery = fillTemplate(query.text, query.variables).trim();
    return resolvedInstruction ? `${resolvedInstruction}\n\n${resolvedQuery}` : resolvedQuery;
}
