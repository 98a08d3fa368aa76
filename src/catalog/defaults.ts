/**
 * Catalogs — bundled defaults, configuration entries and subset selection.
 */
import { createHash } from "crypto";
import { z } from "zod/v4";
import { Domain, InstructionTemplate } from "../schemas/catalog.js";
import type { ModelDescriptor, QueryVariant } from "../schemas/catalog.js";
import { BaseQueryEntry, ModelEntry } from "../schemas/config.js";
import type { EngineConfig } from "../schemas/config.js";
import { ConfigurationError } from "../errors/index.js";
import { inferProviderFromName } from "../llm/resolve.js";
import { readDataFile } from "./data.js";

export function defaultModelEntries(): ModelEntry[] {
    return readDataFile("models.json", z.array(ModelEntry));
}

export function defaultInstructions(): InstructionTemplate[] {
    return readDataFile("instructions.json", z.array(InstructionTemplate));
}

export function defaultDomains(): Domain[] {
    return readDataFile("domains.json", z.array(Domain));
}

export function defaultQueries(): BaseQueryEntry[] {
    return readDataFile("queries.json", z.array(BaseQueryEntry));
}

/**
 * A configured model with its provider settled. Entries without `provider`
 * get one inferred from the name; an uninferable name is rejected.
 */
export function resolveModelEntry(entry: ModelEntry): ModelDescriptor {
    const provider = entry.provider ?? inferProviderFromName(entry.model ?? entry.name);
    if (!provider) {
        throw new ConfigurationError(`models.${entry.id}.provider`, `cannot infer a provider from "${entry.name}"; set it explicitly`);
    }
    return {
        id: entry.id,
        name: entry.name,
        provider,
        model: entry.model ?? entry.name,
        parameters: entry.parameters,
    };
}

export function toBaseQuery(entry: BaseQueryEntry): QueryVariant {
    return { id: entry.id, text: entry.text, origin: "base", variables: entry.variables };
}

function shortHash(text: string): string {
    return createHash("sha256").update(text).digest("hex").slice(0, 8);
}

/** A base query from free text; the id is stable for the same text. */
export function queryFromText(text: string): QueryVariant {
    return { id: `query_${shortHash(text)}`, text, origin: "base", variables: {} };
}

/** A query variant written by the user rather than generated. */
export function userOverrideQuery(text: string, baseId?: string): QueryVariant {
    return {
        id: `query_user_${shortHash(text)}`,
        text,
        origin: "user_override",
        ...(baseId ? { base_id: baseId } : {}),
        variables: {},
    };
}

/** The first `count` entries, in catalog order; all of them when `count` is undefined. */
export function selectFirst<T>(items: readonly T[], count: number | undefined, field: string): T[] {
    if (count === undefined) return [...items];
    if (!Number.isInteger(count) || count < 1) {
        throw new ConfigurationError(field, "count must be a positive integer");
    }
    return items.slice(0, count);
}

/** Domains whose name, description or keywords contain `term` (case-insensitive). */
export function searchDomains(domains: readonly Domain[], term: string): Domain[] {
    const needle = term.toLowerCase();
    return domains.filter((domain) =>
        domain.name.toLowerCase().includes(needle) ||
        domain.id.toLowerCase() === needle ||
        domain.description.toLowerCase().includes(needle) ||
        domain.keywords.some((keyword) => keyword.toLowerCase().includes(needle)),
    );
}

export interface ResolvedCatalogs {
    models: ModelDescriptor[];
    instructions: InstructionTemplate[];
    queries: QueryVariant[];
    domains: Domain[];
}

/** Configuration catalogs, with the bundled defaults for any section left out. */
export function resolveCatalogs(config: EngineConfig): ResolvedCatalogs {
    return {
        models: (config.models ?? defaultModelEntries()).map(resolveModelEntry),
        instructions: config.instructions ?? defaultInstructions(),
        queries: (config.queries ?? defaultQueries()).map(toBaseQuery),
        domains: config.domains ?? defaultDomains(),
    };
}
