/**
 * Turns `run` command flags into the catalog selection and overrides the
 * pipeline consumes.
 */
import { ConfigurationError } from "../errors/index.js";
import { SynthesisMethodName } from "../schemas/config.js";
import type { EngineConfig } from "../schemas/config.js";
import type { Domain, QueryVariant } from "../schemas/catalog.js";
import type { ResolvedCatalogs } from "../catalog/defaults.js";
import { queryFromText, searchDomains, selectFirst, userOverrideQuery } from "../catalog/defaults.js";
import { generateVariations } from "../catalog/variations.js";
import type { OutputFormat } from "../output/format.js";
import type { RunSelection } from "../pipeline.js";

export interface SelectionFlags {
    query?: string;
    variant?: string[];
    domain?: string;
    withoutDomain?: boolean;
    models?: string;
    instructions?: string;
    variations?: string;
}

export interface RunFlags extends SelectionFlags {
    config?: string;
    maxCombinations?: string;
    balancedModels?: boolean;
    simulate?: boolean;
    dryRun?: boolean;
    synthesizeMethod?: string[];
    concurrency?: string;
    loadState?: string;
    saveState?: string;
    outputFormat?: string;
    outputFile?: string;
}

export const DEFAULT_MAX_COMBINATIONS = 20;

/** A positive integer flag; undefined when the flag was not given. */
export function parseCount(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) return undefined;
    const count = Number(value);
    if (!Number.isInteger(count) || count < 1) {
        throw new ConfigurationError(flag, `expected a positive integer, got "${value}"`);
    }
    return count;
}

/** Like parseCount, but zero is allowed. */
function parseNonNegative(value: string | undefined, flag: string): number {
    if (value === undefined) return 0;
    const count = Number(value);
    if (!Number.isInteger(count) || count < 0) {
        throw new ConfigurationError(flag, `expected a non-negative integer, got "${value}"`);
    }
    return count;
}

function selectQueries(catalogs: ResolvedCatalogs, flags: SelectionFlags): QueryVariant[] {
    const bases = flags.query ? [queryFromText(flags.query)] : catalogs.queries;
    const variationCount = parseNonNegative(flags.variations, "--variations");

    const queries: QueryVariant[] = [];
    for (const base of bases) {
        queries.push(base, ...generateVariations(base, variationCount));
    }
    const overrideBase = bases.length === 1 ? bases[0].id : undefined;
    for (const text of flags.variant ?? []) {
        const override = userOverrideQuery(text, overrideBase);
        if (!queries.some((query) => query.id === override.id)) queries.push(override);
    }
    return queries;
}

function selectDomains(catalogs: ResolvedCatalogs, flags: SelectionFlags): (Domain | null)[] {
    if (flags.withoutDomain) {
        if (flags.domain) throw new ConfigurationError("--domain", "cannot be combined with --without-domain");
        return [null];
    }
    if (!flags.domain) return catalogs.domains;

    const matches = searchDomains(catalogs.domains, flags.domain);
    if (matches.length === 0) {
        throw new ConfigurationError("--domain", `no domain matches "${flags.domain}"`);
    }
    return matches;
}

export function buildSelection(catalogs: ResolvedCatalogs, flags: SelectionFlags): RunSelection {
    return {
        models: selectFirst(catalogs.models, parseCount(flags.models, "--models"), "--models"),
        instructions: selectFirst(catalogs.instructions, parseCount(flags.instructions, "--instructions"), "--instructions"),
        queries: selectQueries(catalogs, flags),
        domains: selectDomains(catalogs, flags),
    };
}

export function parseSynthesisMethods(values: string[] | undefined): SynthesisMethodName[] | undefined {
    if (!values || values.length === 0) return undefined;
    return values.map((value) => {
        const parsed = SynthesisMethodName.safeParse(value);
        if (!parsed.success) {
            throw new ConfigurationError("--synthesize-method", `unknown method "${value}" (expected ${SynthesisMethodName.options.join(", ")})`);
        }
        return parsed.data;
    });
}

export function parseOutputFormat(value: string | undefined, config: EngineConfig): OutputFormat {
    if (value === undefined) return config.extraction_settings.output_formats[0] ?? "markdown";
    if (value === "markdown" || value === "json") return value;
    throw new ConfigurationError("--output-format", `expected "markdown" or "json", got "${value}"`);
}

/** The configuration with command-line overrides applied. */
export function applyOverrides(config: EngineConfig, flags: RunFlags): EngineConfig {
    const concurrency = parseCount(flags.concurrency, "--concurrency");
    if (concurrency === undefined) return config;
    return { ...config, execution: { ...config.execution, max_concurrency: concurrency } };
}
