/**
 * SessionState Tests — persistence, idempotent merges and the document
 * invariants every mutation must preserve.
 */
import { describe, it, expect } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { SessionState } from "../../core/session.js";
import { ConfigurationError, StateIntegrityError } from "../../errors/index.js";
import { defaultDomains, defaultInstructions, defaultModelEntries, resolveModelEntry } from "../../catalog/defaults.js";
import type { Cluster, SynthesizedIdea } from "../../schemas/session.js";
import {
    FIXED_NOW,
    fixedClock,
    makeDomain,
    makeInstruction,
    makeModel,
    makeQuery,
    makeResult,
} from "../../__tests__/fixtures.js";

const C1 = "m1::i1::q1::d1";
const C2 = "m2::i1::q1::d1";

function makeSession(): SessionState {
    const session = SessionState.create({ sessionId: "session-1", clock: fixedClock });
    session.registerModels([makeModel("m1"), makeModel("m2")]);
    session.registerInstructions([makeInstruction("i1")]);
    session.registerQueries([makeQuery("q1")]);
    session.registerDomains([makeDomain("d1")]);
    session.addCombinations([
        { model_id: "m1", instruction_id: "i1", query_id: "q1", domain_id: "d1" },
        { model_id: "m2", instruction_id: "i1", query_id: "q1", domain_id: "d1" },
    ]);
    return session;
}

const cluster: Cluster = {
    id: "c0-0",
    run: 0,
    label: "food waste",
    method: "keyword_overlap",
    member_result_ids: ["r1", "r2"],
    centroid: null,
};

const idea: SynthesizedIdea = {
    id: "idea_0_1",
    run: 0,
    title: "Food Waste",
    text: "Combine both.",
    method: "cluster_based",
    source_cluster_ids: ["c0-0"],
    source_result_ids: ["r1", "r2"],
    contributions: { m1: 0.5, m2: 0.5 },
    average_score: 0.5,
    created_at: FIXED_NOW.toISOString(),
};

function makePopulatedSession(): SessionState {
    const session = makeSession();
    session.recordResult(makeResult({ id: "r1", combination_id: C1, text: "Compost leftovers." }));
    session.recordResult(makeResult({ id: "r2", combination_id: C2, text: "Share surplus food." }));
    session.recordScores([
        { result_id: "r1", criteria: { novelty: 0.6 }, aggregate: 0.6, scoring_revision: 0 },
        { result_id: "r2", criteria: { novelty: 0.4 }, aggregate: 0.4, scoring_revision: 0 },
    ]);
    session.beginRun();
    session.addClusters([cluster]);
    session.addIdeas([idea]);
    return session;
}

describe("SessionState creation", () => {
    it("starts empty with the clock's timestamp", () => {
        const doc = SessionState.create({ sessionId: "s", clock: fixedClock }).toDocument();

        expect(doc.version).toBe(2);
        expect(doc.session_id).toBe("s");
        expect(doc.created_at).toBe("2025-01-01T00:00:00.000Z");
        expect(doc.combinations).toEqual([]);
        expect(doc.run_count).toBe(0);
    });

    it("generates a session id when none is given", () => {
        expect(SessionState.create().sessionId).toMatch(/^[0-9a-f-]{36}$/);
    });
});

describe("SessionState persistence", () => {
    it("re-serializes a loaded document byte for byte", () => {
        const first = makePopulatedSession().serialize();
        const second = SessionState.fromDocument(JSON.parse(first), { clock: fixedClock }).serialize();

        expect(second).toBe(first);
        expect(first.endsWith("}\n")).toBe(true);
        expect(first.split("\n")[1]).toBe('  "version": 2,');
    });

    it("saves and loads through the filesystem", async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ideamesh-session-"));
        try {
            const file = path.join(dir, "nested", "state.json");
            const session = makePopulatedSession();
            await session.save(file);

            const loaded = await SessionState.load(file, { clock: fixedClock });
            expect(loaded.toDocument()).toEqual(session.toDocument());
            expect(await fs.readFile(file, "utf-8")).toBe(session.serialize());
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it("rejects files that are not JSON", async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ideamesh-session-"));
        try {
            const file = path.join(dir, "state.json");
            await fs.writeFile(file, "{ not json");
            await expect(SessionState.load(file)).rejects.toBeInstanceOf(StateIntegrityError);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it("rejects unsupported versions and malformed shapes", () => {
        const doc = makeSession().toDocument();

        expect(() => SessionState.fromDocument({ ...doc, version: 3 })).toThrow(StateIntegrityError);
        expect(() => SessionState.fromDocument({ ...doc, run_count: -1 })).toThrow(StateIntegrityError);
        expect(() => SessionState.fromDocument([])).toThrow(StateIntegrityError);
    });
});

describe("SessionState integrity", () => {
    it("rejects a combination whose id does not match its tuple", () => {
        const doc = makeSession().toDocument();
        doc.combinations[0].id = "m1::i1::q1::other";

        expect(() => SessionState.fromDocument(doc)).toThrow(/does not match its tuple/);
    });

    it("rejects combinations referencing unknown catalog entries", () => {
        const doc = makeSession().toDocument();
        doc.catalogs.models = doc.catalogs.models.filter((model) => model.id !== "m2");

        expect(() => SessionState.fromDocument(doc)).toThrow(StateIntegrityError);
    });

    it("rejects scores without their result", () => {
        const doc = makeSession().toDocument();
        doc.combinations[0].score = { result_id: "r9", criteria: {}, aggregate: 0, scoring_revision: 0 };

        expect(() => SessionState.fromDocument(doc)).toThrow(StateIntegrityError);
    });

    it("rejects ideas whose shares do not sum to one", () => {
        const doc = makePopulatedSession().toDocument();
        doc.ideas[0].contributions = { m1: 0.5, m2: 0.4 };

        expect(() => SessionState.fromDocument(doc)).toThrow(/sum to/);
    });

    it("rejects ideas whose shares miss a source model", () => {
        const doc = makePopulatedSession().toDocument();
        doc.ideas[0].contributions = { m1: 1 };

        expect(() => SessionState.fromDocument(doc)).toThrow(/exactly the source models/);
    });

    it("rejects cluster members that are not results", () => {
        const session = makeSession();

        expect(() => session.addClusters([cluster])).toThrow(StateIntegrityError);
    });
});

describe("SessionState mutations", () => {
    it("skips tuples already in the session", () => {
        const session = makeSession();
        const added = session.addCombinations([
            { model_id: "m1", instruction_id: "i1", query_id: "q1", domain_id: "d1" },
            { model_id: "m1", instruction_id: "i1", query_id: "q1", domain_id: null },
        ]);

        expect(added.map((combination) => combination.id)).toEqual(["m1::i1::q1::none"]);
        expect(session.combinations).toHaveLength(3);
    });

    it("rejects combinations with unregistered catalog entries", () => {
        const session = makeSession();

        expect(() => session.addCombinations([
            { model_id: "m9", instruction_id: "i1", query_id: "q1", domain_id: null },
        ])).toThrow(StateIntegrityError);
    });

    it("records a result exactly once", () => {
        const session = makeSession();
        session.recordResult(makeResult({ id: "r1", combination_id: C1 }));

        expect(() => session.recordResult(makeResult({ id: "r3", combination_id: C1 }))).toThrow(StateIntegrityError);
        expect(() => session.recordResult(makeResult({ id: "r1", combination_id: C2 }))).toThrow(/duplicate result id/);
        expect(session.pending().map((combination) => combination.id)).toEqual([C2]);
        expect(session.executed().map((combination) => combination.id)).toEqual([C1]);
    });

    it("keeps referenced catalog entries immutable", () => {
        const session = makeSession();
        const changed = { ...makeModel("m1"), model: "another-model" };

        expect(() => session.registerModels([changed])).toThrow(ConfigurationError);
        expect(() => session.registerModels([makeModel("m1")])).not.toThrow();
    });

    it("allows unreferenced catalog entries to change", () => {
        const session = makeSession();
        session.registerModels([makeModel("m3")]);
        session.registerModels([{ ...makeModel("m3"), model: "renamed" }]);

        expect(session.model("m3")?.model).toBe("renamed");
    });

    it("reserves the no-domain id", () => {
        expect(() => makeSession().registerDomains([makeDomain("none")])).toThrow(ConfigurationError);
    });

    it("counts runs from zero", () => {
        const session = makeSession();

        expect(session.beginRun()).toBe(0);
        expect(session.beginRun()).toBe(1);
        expect(session.runCount).toBe(2);
    });

    it("points clustered combinations at their cluster", () => {
        const session = makePopulatedSession();

        expect(session.combination(C1)?.cluster_id).toBe("c0-0");
        expect(session.combination(C2)?.cluster_id).toBe("c0-0");
    });

    it("clears a result together with its score, memberships and ideas", () => {
        const session = makePopulatedSession();
        session.clearResult(C1);

        expect(session.combination(C1)).toEqual({
            id: C1,
            model_id: "m1",
            instruction_id: "i1",
            query_id: "q1",
            domain_id: "d1",
        });
        expect(session.clusters[0].member_result_ids).toEqual(["r2"]);
        expect(session.ideas).toEqual([]);
        expect(session.combination(C2)?.cluster_id).toBe("c0-0");
    });

    it("drops clusters left without members", () => {
        const session = makePopulatedSession();
        session.clearResult(C1);
        session.clearResult(C2);

        expect(session.clusters).toEqual([]);
        expect(session.pending()).toHaveLength(2);
        expect(() => SessionState.fromDocument(session.toDocument())).not.toThrow();
    });
});

describe("legacy session import", () => {
    const legacy = {
        combinations: [
            { id: "combo_1", model: "gpt-4o", template: "analytical", query: "q_food", domain: "agriculture" },
            { id: "combo_2", model: "claude-3-opus", template: "analytical", query: "q_food", domain: null },
        ],
        results: {
            combo_1: {
                prompt: "Think like an analyst.\n\nHow might we reduce food waste?",
                response: "Track spoilage with sensors.",
                metadata: { template_style: "analytical", timestamp: 1700000000, duration: 1.5 },
            },
            combo_2: {
                prompt: "Think like an analyst.\n\nHow might we reduce food waste?",
                response: "Error generating response: rate limit",
                metadata: {},
            },
        },
        evaluations: {
            combo_1: { novelty: 0.7, feasibility: 1.4, overall: 0.8 },
        },
        synthesized_ideas: {
            idea_1: {
                title: "Sensor Tracking",
                description: "Use sensors everywhere.",
                source_combinations: ["combo_1", "combo_missing"],
                metadata: { method: "cluster_based", average_score: 0.8 },
            },
        },
    };

    it("rebuilds catalogs, results and scores", () => {
        const session = SessionState.fromDocument(legacy, { clock: fixedClock });
        const first = session.combination("gpt-4o::analytical::q_food::agriculture");
        const second = session.combination("claude-3-opus::analytical::q_food::none");

        expect(session.model("gpt-4o")?.provider).toBe("openai");
        expect(session.model("claude-3-opus")?.provider).toBe("anthropic");
        expect(session.instruction("analytical")?.metadata).toEqual({ cognitive_style: "analytical" });
        expect(session.query("q_food")?.text).toBe("How might we reduce food waste?");

        expect(first?.result).toEqual({
            id: "result_combo_1",
            combination_id: "gpt-4o::analytical::q_food::agriculture",
            prompt: "Think like an analyst.\n\nHow might we reduce food waste?",
            text: "Track spoilage with sensors.",
            status: "succeeded",
            simulated: false,
            attempts: 1,
            executed_at: "2023-11-14T22:13:20.000Z",
            duration_ms: 1500,
        });
        expect(first?.score).toEqual({
            result_id: "result_combo_1",
            criteria: { novelty: 0.7, feasibility: 1 },
            aggregate: 0.8,
            scoring_revision: 0,
        });
        expect(second?.result?.status).toBe("failed");
        expect(second?.result?.error).toBe("rate limit");
        expect(second?.result?.text).toBe("");
    });

    it("lets the configured catalogs replace migrated placeholders", () => {
        const session = SessionState.fromDocument({
            combinations: [
                { id: "combo_1", model: "gpt-4o-mini", template: "ins_analytical", query: "q_food", domain: "domain_education" },
            ],
            results: {
                combo_1: { prompt: "Think like an analyst.\n\nHow might we reduce food waste?", response: "Teach composting." },
            },
        }, { clock: fixedClock });
        const instructions = defaultInstructions();
        const domains = defaultDomains();

        session.registerModels(defaultModelEntries().map(resolveModelEntry));
        session.registerInstructions(instructions);
        session.registerQueries([makeQuery("q_food")]);
        session.registerDomains(domains);

        expect(session.instruction("ins_analytical")).toEqual(instructions.find((entry) => entry.id === "ins_analytical"));
        expect(session.domain("domain_education")).toEqual(domains.find((entry) => entry.id === "domain_education"));
        expect(session.model("gpt-4o-mini")?.legacy_placeholder).toBeUndefined();
        expect(session.query("q_food")).toEqual(makeQuery("q_food"));
        expect(session.combination("gpt-4o-mini::ins_analytical::q_food::domain_education")?.result?.text)
            .toBe("Teach composting.");
        expect(() => session.registerInstructions([makeInstruction("ins_analytical", "Something else.")]))
            .toThrow(ConfigurationError);
        expect(() => SessionState.fromDocument(session.toDocument())).not.toThrow();
    });

    it("marks every rebuilt catalog entry as a placeholder", () => {
        const session = SessionState.fromDocument(legacy, { clock: fixedClock });

        expect(session.model("gpt-4o")?.legacy_placeholder).toBe(true);
        expect(session.instruction("analytical")?.legacy_placeholder).toBe(true);
        expect(session.query("q_food")?.legacy_placeholder).toBe(true);
        expect(session.domain("agriculture")?.legacy_placeholder).toBe(true);
    });

    it("keeps ideas with the sources that still exist", () => {
        const session = SessionState.fromDocument(legacy, { clock: fixedClock });

        expect(session.runCount).toBe(1);
        expect(session.ideas).toEqual([{
            id: "idea_1",
            run: 0,
            title: "Sensor Tracking",
            text: "Use sensors everywhere.",
            method: "cluster_based",
            source_cluster_ids: [],
            source_result_ids: ["result_combo_1"],
            contributions: { "gpt-4o": 1 },
            average_score: 0.8,
            created_at: "2025-01-01T00:00:00.000Z",
        }]);
    });
});
