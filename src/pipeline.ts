/**
 * Pipeline — one run of the exploration lifecycle against a session:
 *
 *   1. Generation — pick new combinations within the budget
 *   2. Execution — run pending combinations, merging each Result
 *   3. Scoring — score every Result that has no Score yet
 *   4. Clustering — group the top Results
 *   5. Synthesis — build ideas with model provenance
 *   6. Feedback — derive the scoring snapshot for later runs
 *
 * Progress is reported through callbacks; nothing here prints.
 */
import type { Domain, InstructionTemplate, ModelDescriptor, QueryVariant } from "./schemas/catalog.js";
import type { EngineConfig, ScoringConfig, SynthesisMethodName } from "./schemas/config.js";
import type { Combination, Result, SynthesizedIdea } from "./schemas/session.js";
import { SessionState } from "./core/session.js";
import { generateCombinations } from "./core/generator.js";
import { ExecutionScheduler } from "./core/scheduler.js";
import type { ExecutionSummary, PlanEntry, SchedulerEvents } from "./core/scheduler.js";
import type { Sleep } from "./core/retry.js";
import { ScoringEngine, isScorable, rankResults } from "./evaluation/scoring.js";
import { validatePatternSettings } from "./evaluation/patterns.js";
import { analyzeClusters } from "./evaluation/clustering.js";
import type { ClusterAnalysis } from "./evaluation/clustering.js";
import { applyFeedback } from "./evaluation/feedback.js";
import type { FeedbackOutcome, ScoredResult } from "./evaluation/feedback.js";
import { ExtractiveComposer, methodFromSettings, synthesize } from "./synthesis/index.js";
import type { IdeaComposer, SourceResult } from "./synthesis/index.js";
import type { ModelInvoker } from "./llm/invoker.js";
import type { Embedder } from "./llm/embedder.js";

export type PipelinePhase = "generation" | "execution" | "scoring" | "clustering" | "synthesis" | "feedback";

/** The catalog entries this run draws combinations from. */
export interface RunSelection {
    models: ModelDescriptor[];
    instructions: InstructionTemplate[];
    queries: QueryVariant[];
    /** `null` is the "no domain" slot. */
    domains: (Domain | null)[];
}

export interface PipelineOptions {
    session: SessionState;
    config: EngineConfig;
    selection: RunSelection;
    invoker: ModelInvoker;
    embedder?: Embedder;
    /** Defaults to the deterministic ExtractiveComposer. */
    composer?: IdeaComposer;
    maxCombinations: number;
    balanced?: boolean;
    simulate?: boolean;
    dryRun?: boolean;
    /** Overrides `extraction_settings.synthesis_methods`. */
    synthesisMethods?: SynthesisMethodName[];
    signal?: AbortSignal;
    sleep?: Sleep;
    clock?: () => Date;
    /** Callback for phase changes. */
    onPhaseChange?: (phase: PipelinePhase) => void;
    /** Callback after each Result is merged; the CLI saves the session here. */
    onCombinationExecuted?: (combination: Combination, result: Result) => void | Promise<void>;
    /** Callback for recoverable problems: simulated fallbacks, clustering fallback, retries. */
    onWarning?: (message: string) => void;
}

export interface PipelineReport {
    dryRun: boolean;
    /** Execution was aborted; scoring and later phases did not run. */
    interrupted: boolean;
    /** Run index, or null for a dry run. */
    run: number | null;
    generated: Combination[];
    execution: ExecutionSummary;
    plan: PlanEntry[];
    scored: number;
    clusterAnalysis?: ClusterAnalysis;
    ideas: SynthesizedIdea[];
    scoring: ScoringConfig;
    feedback?: FeedbackOutcome;
}

function sessionKeywords(session: SessionState): string[] {
    return session.catalogs.domains.flatMap((domain) => domain.keywords);
}

function scoredResults(session: SessionState): ScoredResult[] {
    const scored: ScoredResult[] = [];
    for (const combination of session.combinations) {
        if (combination.result && combination.score) {
            scored.push({ result: combination.result, score: combination.score });
        }
    }
    return scored;
}

/** Register the selection's catalog entries and add the generated combinations. */
function extendSession(session: SessionState, options: PipelineOptions): Combination[] {
    const { selection } = options;
    session.registerModels(selection.models);
    session.registerInstructions(selection.instructions);
    session.registerQueries(selection.queries);
    session.registerDomains(selection.domains.filter((domain): domain is Domain => domain !== null));

    const candidates = generateCombinations({
        models: selection.models,
        instructions: selection.instructions,
        queries: selection.queries,
        domains: selection.domains,
        maxCombinations: options.maxCombinations,
        balanced: options.balanced ?? false,
        existing: session.tupleKeys(),
    });
    return session.addCombinations(candidates);
}

/**
 * Run the full lifecycle once. Configuration problems surface as
 * ConfigurationError before any combination executes. A dry run works on a
 * copy and leaves `options.session` untouched. An aborted run stops after
 * execution with every merged Result kept.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineReport> {
    const { config, onPhaseChange, onWarning } = options;
    const dryRun = options.dryRun ?? false;
    const clock = options.clock ?? (() => new Date());

    // Validate everything that can fail before touching the session.
    const scoringEngine = new ScoringEngine(
        options.session.scoring ?? { revision: 0, criteria: config.scoring_criteria },
        { onDegraded: (error) => onWarning?.(error.message) },
    );
    validatePatternSettings(config.evaluation_settings.pattern_detection);
    const methodNames = options.synthesisMethods ?? config.extraction_settings.synthesis_methods;

    const session = dryRun
        ? SessionState.fromDocument(options.session.toDocument(), { clock })
        : options.session;

    onPhaseChange?.("generation");
    const generated = extendSession(session, options);

    onPhaseChange?.("execution");
    const scheduler = new ExecutionScheduler({
        invoker: options.invoker,
        settings: config.execution,
        simulate: options.simulate,
        dryRun,
        signal: options.signal,
        sleep: options.sleep,
        clock,
    });
    scheduler.on("provider:unavailable", ({ model }: SchedulerEvents["provider:unavailable"][0]) => {
        onWarning?.(`Provider "${model.provider}" is unavailable for model "${model.id}"; using simulated responses.`);
    });
    scheduler.on("combination:retry", ({ combination, attempt, delayMs, error }: SchedulerEvents["combination:retry"][0]) => {
        onWarning?.(`${combination.id}: attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms.`);
    });
    const pendingSaves: Promise<void>[] = [];
    const saveErrors: unknown[] = [];
    scheduler.on("combination:executed", ({ combination, result }: SchedulerEvents["combination:executed"][0]) => {
        const saved = options.onCombinationExecuted?.(combination, result);
        if (saved instanceof Promise) {
            pendingSaves.push(saved.catch((err: unknown) => {
                saveErrors.push(err);
            }));
        }
    });
    const execution = await scheduler.run(session);
    await Promise.all(pendingSaves);
    if (saveErrors.length > 0) throw saveErrors[0];

    const interrupted = !dryRun && execution.aborted;
    if (dryRun || interrupted) {
        return {
            dryRun,
            interrupted,
            run: null,
            generated,
            execution,
            plan: execution.planned,
            scored: 0,
            ideas: [],
            scoring: scoringEngine.config,
        };
    }

    const run = session.beginRun();

    onPhaseChange?.("scoring");
    const executed = session.executed();
    const results = executed.flatMap((combination) => (combination.result ? [combination.result] : []));
    const scores = scoringEngine.scoreAll(results.filter(isScorable), sessionKeywords(session));
    const fresh = executed.flatMap((combination) => {
        const { result } = combination;
        if (!result || combination.score) return [];
        return [scores.get(result.id) ?? scoringEngine.zeroScore(result.id)];
    });
    session.recordScores(fresh);
    session.setScoring(scoringEngine.config);

    onPhaseChange?.("clustering");
    const clusterAnalysis = await analyzeClusters({
        combinations: session.combinations,
        settings: config.evaluation_settings.clustering,
        patternSettings: config.evaluation_settings.pattern_detection,
        embedder: options.embedder,
        run,
    });
    if (clusterAnalysis.fallbackReason && options.embedder) {
        onWarning?.(`Embedding clustering unavailable (${clusterAnalysis.fallbackReason}); grouped by keyword overlap.`);
    }
    if (clusterAnalysis.clusters.length > 0) session.addClusters(clusterAnalysis.clusters);

    onPhaseChange?.("synthesis");
    const sources: SourceResult[] = rankResults(
        session.combinations,
        "overall",
        config.evaluation_settings.clustering.top_n,
    ).map((entry) => ({ result: entry.result, modelId: entry.combination.model_id, score: entry.score.aggregate }));
    const composer = options.composer ?? new ExtractiveComposer();
    const ideas: SynthesizedIdea[] = [];
    for (const name of methodNames) {
        const produced = await synthesize(
            {
                clusters: clusterAnalysis.clusters,
                sources,
                composer,
                run,
                firstIdeaNumber: ideas.length + 1,
                clock,
            },
            methodFromSettings(name, config.extraction_settings),
        );
        if (produced.length === 0) onWarning?.(`Synthesis method "${name}" produced no ideas.`);
        ideas.push(...produced);
    }
    if (ideas.length > 0) session.addIdeas(ideas);

    let feedback: FeedbackOutcome | undefined;
    const feedbackSettings = config.extraction_settings.feedback_integration;
    if (feedbackSettings.weights_adjustment || feedbackSettings.criteria_evolution) {
        onPhaseChange?.("feedback");
        feedback = applyFeedback({
            scoring: scoringEngine.config,
            settings: feedbackSettings,
            scored: scoredResults(session),
            selectedResultIds: new Set(ideas.flatMap((idea) => idea.source_result_ids)),
            domainKeywords: sessionKeywords(session),
        });
        if (feedback.changed) session.setScoring(feedback.scoring);
    }

    return {
        dryRun,
        interrupted,
        run,
        generated,
        execution,
        plan: [],
        scored: fresh.length,
        clusterAnalysis,
        ideas,
        scoring: session.scoring ?? scoringEngine.config,
        feedback,
    };
}
