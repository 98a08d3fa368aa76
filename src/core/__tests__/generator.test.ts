import { describe, it, expect } from "vitest";
import { generateCombinations } from "../../core/generator.js";
import type { GeneratorInput } from "../../core/generator.js";
import type { NewCombination } from "../../core/session.js";
import { tupleKey } from "../../core/tuple.js";
import { ConfigurationError } from "../../errors/index.js";
import { makeDomain, makeInstruction, makeModel, makeQuery } from "../../__tests__/fixtures.js";

function makeInput(overrides: Partial<GeneratorInput> = {}): GeneratorInput {
    return {
        models: [makeModel("m1"), makeModel("m2"), makeModel("m3")],
        instructions: [makeInstruction("i1"), makeInstruction("i2"), makeInstruction("i3")],
        queries: [makeQuery("q1"), makeQuery("q2")],
        domains: [makeDomain("d1")],
        maxCombinations: 9,
        balanced: true,
        ...overrides,
    };
}

function keys(entries: readonly NewCombination[]): string[] {
    return entries.map((entry) => tupleKey(entry.model_id, entry.instruction_id, entry.query_id, entry.domain_id));
}

function countBy(entries: readonly NewCombination[], pick: (entry: NewCombination) => string): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of entries) counts[pick(entry)] = (counts[pick(entry)] ?? 0) + 1;
    return counts;
}

describe("generateCombinations()", () => {
    it("gives each of three models three combinations from a budget of nine", () => {
        const generated = generateCombinations(makeInput());

        expect(generated).toHaveLength(9);
        expect(new Set(keys(generated)).size).toBe(9);
        expect(countBy(generated, (entry) => entry.model_id)).toEqual({ m1: 3, m2: 3, m3: 3 });
    });

    it("rotates instructions and queries within a model", () => {
        const generated = generateCombinations(makeInput()).filter((entry) => entry.model_id === "m1");

        expect(generated.map((entry) => [entry.instruction_id, entry.query_id])).toEqual([
            ["i1", "q1"],
            ["i2", "q2"],
            ["i3", "q1"],
        ]);
    });

    it("hands the remainder of the budget to the first models", () => {
        const generated = generateCombinations(makeInput({ maxCombinations: 10 }));

        expect(countBy(generated, (entry) => entry.model_id)).toEqual({ m1: 4, m2: 3, m3: 3 });
        expect(generated[3]).toEqual({ model_id: "m1", instruction_id: "i1", query_id: "q2", domain_id: "d1" });
    });

    it("truncates the enumeration when unbalanced", () => {
        const generated = generateCombinations(makeInput({ balanced: false }));

        expect(countBy(generated, (entry) => entry.model_id)).toEqual({ m1: 6, m2: 3 });
        expect(generated[0]).toEqual({ model_id: "m1", instruction_id: "i1", query_id: "q1", domain_id: "d1" });
        expect(generated[1]).toEqual({ model_id: "m1", instruction_id: "i1", query_id: "q2", domain_id: "d1" });
    });

    it("returns every candidate when the budget covers them", () => {
        const generated = generateCombinations(makeInput({ maxCombinations: 100 }));

        expect(generated).toHaveLength(18);
    });

    it("never regenerates existing tuples", () => {
        const first = generateCombinations(makeInput());
        const second = generateCombinations(makeInput({ existing: new Set(keys(first)) }));
        const third = generateCombinations(makeInput({ existing: new Set([...keys(first), ...keys(second)]) }));

        expect(second).toHaveLength(9);
        expect(keys(second).filter((key) => keys(first).includes(key))).toEqual([]);
        expect(third).toEqual([]);
    });

    it("redistributes quota a model cannot use", () => {
        const exhausted = generateCombinations(makeInput({ models: [makeModel("m1")], maxCombinations: 5, balanced: false }));
        const generated = generateCombinations(makeInput({ existing: new Set(keys(exhausted)) }));

        expect(countBy(generated, (entry) => entry.model_id)).toEqual({ m1: 1, m2: 4, m3: 4 });
    });

    it("uses the null slot for ungrounded combinations", () => {
        const generated = generateCombinations(makeInput({ domains: [null], maxCombinations: 1, balanced: false }));

        expect(generated).toEqual([{ model_id: "m1", instruction_id: "i1", query_id: "q1", domain_id: null }]);
        expect(keys(generated)).toEqual(["m1::i1::q1::none"]);
    });

    it("rejects empty catalogs and invalid budgets", () => {
        expect(() => generateCombinations(makeInput({ models: [] }))).toThrow(ConfigurationError);
        expect(() => generateCombinations(makeInput({ domains: [] }))).toThrow(ConfigurationError);
        expect(() => generateCombinations(makeInput({ maxCombinations: 0 }))).toThrow(ConfigurationError);
        expect(() => generateCombinations(makeInput({ maxCombinations: 2.5 }))).toThrow(ConfigurationError);

        try {
            generateCombinations(makeInput({ maxCombinations: -1 }));
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigurationError);
            if (err instanceof ConfigurationError) expect(err.field).toBe("max_combinations");
        }
    });
});

describe("generateCombinations() across catalog shapes", () => {
    const shapes = [
        { models: 1, instructions: 1, queries: 1, domains: 1, budgets: [1, 5] },
        { models: 2, instructions: 3, queries: 2, domains: 2, budgets: [1, 7, 12, 24, 30] },
        { models: 4, instructions: 2, queries: 1, domains: 1, budgets: [3, 6, 8, 9] },
        { models: 5, instructions: 5, queries: 3, domains: 2, budgets: [4, 17, 75, 149, 200] },
    ];

    function ids(prefix: string, count: number): string[] {
        return Array.from({ length: count }, (_, index) => `${prefix}${index + 1}`);
    }

    for (const shape of shapes) {
        const modelIds = ids("m", shape.models);
        const perModel = shape.instructions * shape.queries * shape.domains;
        const catalog = {
            models: modelIds.map((id) => makeModel(id)),
            instructions: ids("i", shape.instructions).map((id) => makeInstruction(id)),
            queries: ids("q", shape.queries).map((id) => makeQuery(id)),
            // The last slot is the ungrounded one whenever there is more than one.
            domains: ids("d", shape.domains).map((id, index) => (index > 0 && index === shape.domains - 1 ? null : makeDomain(id))),
        };
        const label = `${shape.models}x${shape.instructions}x${shape.queries}x${shape.domains}`;

        for (const budget of shape.budgets) {
            it(`fills a budget of ${budget} over ${label} without duplicates`, () => {
                for (const balanced of [true, false]) {
                    const generated = generateCombinations({ ...catalog, maxCombinations: budget, balanced });

                    expect(generated).toHaveLength(Math.min(budget, shape.models * perModel));
                    expect(new Set(keys(generated)).size).toBe(generated.length);
                }
            });

            if (Math.ceil(budget / shape.models) <= perModel) {
                it(`keeps model counts within one for a budget of ${budget} over ${label}`, () => {
                    const counts = countBy(
                        generateCombinations({ ...catalog, maxCombinations: budget, balanced: true }),
                        (entry) => entry.model_id,
                    );
                    const perModelCounts = modelIds.map((id) => counts[id] ?? 0);

                    expect(Math.max(...perModelCounts) - Math.min(...perModelCounts)).toBeLessThanOrEqual(1);
                });
            }
        }
    }
});
