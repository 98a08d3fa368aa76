/**
 * Catalog Tests — bundled defaults, model resolution, domain search and
 * query variations.
 */
import { describe, it, expect } from "vitest";
import {
    queryFromText,
    resolveCatalogs,
    resolveModelEntry,
    searchDomains,
    selectFirst,
    userOverrideQuery,
} from "../../catalog/defaults.js";
import { VARIATION_STRATEGIES, generateVariations } from "../../catalog/variations.js";
import { EngineConfig, ModelEntry } from "../../schemas/config.js";
import { ConfigurationError } from "../../errors/index.js";
import { makeDomain, makeQuery } from "../../__tests__/fixtures.js";

describe("resolveCatalogs()", () => {
    it("falls back to the bundled catalogs", () => {
        const catalogs = resolveCatalogs(EngineConfig.parse({}));

        expect(catalogs.models.map((model) => model.provider)).toEqual(["openai", "anthropic", "google"]);
        expect(catalogs.instructions).toHaveLength(10);
        expect(catalogs.queries).toHaveLength(3);
        expect(catalogs.queries.every((query) => query.origin === "base")).toBe(true);
        expect(catalogs.domains.map((domain) => domain.name)).toEqual([
            "Urban Planning",
            "Education",
            "Healthcare",
            "Sustainability",
            "Technology",
        ]);
    });

    it("uses configured sections as given", () => {
        const config = EngineConfig.parse({
            models: [{ id: "fast", name: "gpt-4o-mini" }],
            queries: [{ id: "q1", text: "How might we cut commute times?" }],
        });

        const catalogs = resolveCatalogs(config);

        expect(catalogs.models).toEqual([{
            id: "fast",
            name: "gpt-4o-mini",
            provider: "openai",
            model: "gpt-4o-mini",
            parameters: {},
        }]);
        expect(catalogs.queries).toEqual([{ id: "q1", text: "How might we cut commute times?", origin: "base", variables: {} }]);
    });
});

describe("resolveModelEntry()", () => {
    it("infers providers from model names", () => {
        expect(resolveModelEntry(ModelEntry.parse({ id: "a", name: "claude-3-5-haiku" })).provider).toBe("anthropic");
        expect(resolveModelEntry(ModelEntry.parse({ id: "b", name: "fast", model: "gemini-2.0-flash" })).provider).toBe("google");
    });

    it("rejects names it cannot place", () => {
        expect(() => resolveModelEntry(ModelEntry.parse({ id: "m", name: "mystery-model" }))).toThrow(ConfigurationError);
    });
});

describe("searchDomains()", () => {
    const domains = [makeDomain("d_health", ["clinics"]), makeDomain("d_city", ["zoning", "transit"])];

    it("matches id, description and keywords case-insensitively", () => {
        expect(searchDomains(domains, "CLINIC").map((domain) => domain.id)).toEqual(["d_health"]);
        expect(searchDomains(domains, "d_city").map((domain) => domain.id)).toEqual(["d_city"]);
        expect(searchDomains(domains, "systems")).toHaveLength(2);
        expect(searchDomains(domains, "oceans")).toEqual([]);
    });
});

describe("selectFirst()", () => {
    it("keeps catalog order and validates the count", () => {
        expect(selectFirst(["a", "b", "c"], 2, "--models")).toEqual(["a", "b"]);
        expect(selectFirst(["a"], undefined, "--models")).toEqual(["a"]);
        expect(() => selectFirst(["a"], 0, "--models")).toThrow(ConfigurationError);
    });
});

describe("query ids", () => {
    it("are stable for the same text", () => {
        expect(queryFromText("Cut waste").id).toBe(queryFromText("Cut waste").id);
        expect(queryFromText("Cut waste").id).toMatch(/^query_[0-9a-f]{8}$/);
        expect(userOverrideQuery("Cut waste", "q1")).toMatchObject({ origin: "user_override", base_id: "q1" });
        expect(userOverrideQuery("Cut waste")).not.toHaveProperty("base_id");
    });
});

describe("generateVariations()", () => {
    const base = makeQuery("q1", "How might we reduce food waste?");

    it("rotates through the strategies", () => {
        const variants = generateVariations(base, 6);

        expect(variants.map((variant) => variant.id)).toEqual(VARIATION_STRATEGIES.map((strategy, i) => `q1_${strategy}_${i + 1}`));
        expect(variants.every((variant) => variant.origin === "generated" && variant.base_id === "q1")).toBe(true);
        expect(variants[3].text).toBe("What are effective ways to reduce food waste?");
        expect(variants[3].variables).toEqual({});
    });

    it("records the phrase it used", () => {
        const [constraint] = generateVariations(base, 1);

        expect(constraint.text).toBe(`How might we reduce food waste, ${constraint.variables.constraint}?`);
    });

    it("is deterministic and never repeats a text", () => {
        const first = generateVariations(base, 10);
        const texts = first.map((variant) => variant.text.toLowerCase());

        expect(generateVariations(base, 10)).toEqual(first);
        expect(new Set([...texts, base.text.toLowerCase()]).size).toBe(texts.length + 1);
    });

    it("returns nothing for a zero count", () => {
        expect(generateVariations(base, 0)).toEqual([]);
    });
});
