/**
 * ExecutionScheduler — runs pending Combinations and merges each Result into
 * the session as soon as it exists.
 *
 * Sequential by default. With `max_concurrency > 1` tasks run through a
 * global p-limit queue plus one queue per provider. Invocation failures are
 * retried with backoff and end as failed Results; they never halt the run.
 * Cancellation is cooperative: it is checked before each combination starts
 * and between retry attempts, never inside a request. A combination whose
 * retries were cut short by an abort stays pending for the next run.
 */
import { EventEmitter } from "events";
import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";
import type { Combination, Result } from "../schemas/session.js";
import type { ExecutionSettings } from "../schemas/config.js";
import type { Domain, InstructionTemplate, ModelDescriptor, ProviderName, QueryVariant } from "../schemas/catalog.js";
import type { InvocationResponse, ModelInvoker } from "../llm/invoker.js";
import { InvocationError, StateIntegrityError } from "../errors/index.js";
import { buildPrompt } from "./prompt.js";
import { retryWithBackoff, defaultSleep } from "./retry.js";
import type { Sleep } from "./retry.js";
import { simulateResponse } from "./simulate.js";
import type { SessionState } from "./session.js";

type Limit = ReturnType<typeof pLimit>;

/** What a dry run reports for one pending combination. */
export interface PlanEntry {
    combination_id: string;
    model_id: string;
    provider: ProviderName;
    mode: "live" | "simulated";
    prompt: string;
}

/** Supported events emitted by the ExecutionScheduler. */
export interface SchedulerEvents {
    "combination:start": [{ combination: Combination; mode: PlanEntry["mode"] }];
    "combination:retry": [{ combination: Combination; attempt: number; delayMs: number; error: Error }];
    "combination:executed": [{ combination: Combination; result: Result }];
    "combination:planned": [{ entry: PlanEntry }];
    "provider:unavailable": [{ model: ModelDescriptor }];
}

export interface ExecutionSummary {
    planned: PlanEntry[];
    executed: number;
    succeeded: number;
    failed: number;
    simulated: number;
    /** Combinations left pending because the run was aborted. */
    skipped: number;
    aborted: boolean;
}

export interface ExecutionSchedulerOptions {
    invoker: ModelInvoker;
    settings: ExecutionSettings;
    simulate?: boolean;
    dryRun?: boolean;
    signal?: AbortSignal;
    sleep?: Sleep;
    clock?: () => Date;
    createResultId?: () => string;
}

export class ExecutionScheduler extends EventEmitter {
    public readonly settings: ExecutionSettings;
    private readonly invoker: ModelInvoker;
    private readonly simulate: boolean;
    private readonly dryRun: boolean;
    private readonly signal?: AbortSignal;
    private readonly sleep: Sleep;
    private readonly clock: () => Date;
    private readonly createResultId: () => string;

    /** Earliest time (ms) the next live dispatch may start. */
    private nextDispatchAt = 0;
    private readonly providerLimits = new Map<ProviderName, Limit>();
    private readonly reportedUnavailable = new Set<string>();

    constructor(options: ExecutionSchedulerOptions) {
        super();
        this.invoker = options.invoker;
        this.settings = options.settings;
        this.simulate = options.simulate ?? false;
        this.dryRun = options.dryRun ?? false;
        this.signal = options.signal;
        this.sleep = options.sleep ?? defaultSleep;
        this.clock = options.clock ?? (() => new Date());
        this.createResultId = options.createResultId ?? (() => uuidv4());
    }

    /**
     * Execute every pending combination of `session`. In dry-run mode the
     * session is left unchanged and only the plan is returned.
     */
    async run(session: SessionState): Promise<ExecutionSummary> {
        const pending = session.pending();
        const summary: ExecutionSummary = {
            planned: [],
            executed: 0,
            succeeded: 0,
            failed: 0,
            simulated: 0,
            skipped: 0,
            aborted: false,
        };

        if (this.dryRun) {
            for (const combination of pending) {
                const entry = this.plan(session, combination);
                summary.planned.push(entry);
                this.emitEvent("combination:planned", { entry });
            }
            return summary;
        }

        const global = pLimit(this.settings.max_concurrency);
        const tasks = pending.map((combination) =>
            global(() => {
                const provider = this.requireModel(session, combination).provider;
                return this.limitFor(provider)(() => this.execute(session, combination, summary));
            }),
        );
        await Promise.all(tasks);

        summary.aborted = this.signal?.aborted ?? false;
        return summary;
    }

    private plan(session: SessionState, combination: Combination): PlanEntry {
        const model = this.requireModel(session, combination);
        return {
            combination_id: combination.id,
            model_id: model.id,
            provider: model.provider,
            mode: this.shouldSimulate(model) ? "simulated" : "live",
            prompt: this.promptFor(session, combination),
        };
    }

    private async execute(session: SessionState, combination: Combination, summary: ExecutionSummary): Promise<void> {
        if (this.signal?.aborted) {
            summary.skipped++;
            return;
        }

        const model = this.requireModel(session, combination);
        const simulated = this.shouldSimulate(model);
        if (simulated && !this.simulate && !this.reportedUnavailable.has(model.id)) {
            this.reportedUnavailable.add(model.id);
            this.emitEvent("provider:unavailable", { model });
        }
        this.emitEvent("combination:start", { combination, mode: simulated ? "simulated" : "live" });

        const prompt = this.promptFor(session, combination);
        const startedAt = this.clock();
        const base = {
            id: this.createResultId(),
            combination_id: combination.id,
            prompt,
            executed_at: startedAt.toISOString(),
        };

        let result: Result;
        if (simulated) {
            const text = simulateResponse({
                combinationId: combination.id,
                model,
                instruction: this.requireInstruction(session, combination),
                query: this.requireQuery(session, combination),
                domain: this.domainOf(session, combination),
            });
            result = { ...base, text, status: "succeeded", simulated: true, attempts: 0, duration_ms: 0 };
        } else {
            await this.pace();
            if (this.signal?.aborted) {
                summary.skipped++;
                return;
            }
            const outcome = await retryWithBackoff(
                async (attempt) => {
                    let response: InvocationResponse;
                    try {
                        response = await this.invoker.invoke(model, prompt);
                    } catch (err) {
                        throw new InvocationError(model.id, attempt, err instanceof Error ? err.message : String(err));
                    }
                    if (!response.success) {
                        throw new InvocationError(model.id, attempt, response.error ?? "unsuccessful response");
                    }
                    return response.text;
                },
                {
                    maxAttempts: this.settings.max_attempts,
                    baseDelayMs: this.settings.base_delay_ms,
                    maxDelayMs: this.settings.max_delay_ms,
                },
                {
                    sleep: this.sleep,
                    signal: this.signal,
                    onRetry: (error, attempt, delayMs) =>
                        this.emitEvent("combination:retry", { combination, attempt, delayMs, error }),
                },
            );
            if (!outcome.ok && outcome.interrupted) {
                summary.skipped++;
                return;
            }
            const duration_ms = Math.max(0, this.clock().getTime() - startedAt.getTime());
            result = outcome.ok
                ? { ...base, text: outcome.value, status: "succeeded", simulated: false, attempts: outcome.attempts, duration_ms }
                : {
                    ...base,
                    text: "",
                    status: "failed",
                    simulated: false,
                    error: outcome.error.message,
                    attempts: outcome.attempts,
                    duration_ms,
                };
        }

        session.recordResult(result);
        summary.executed++;
        if (result.status === "succeeded") summary.succeeded++;
        else summary.failed++;
        if (result.simulated) summary.simulated++;

        const merged = session.combination(combination.id) ?? combination;
        this.emitEvent("combination:executed", { combination: merged, result });
    }

    private shouldSimulate(model: ModelDescriptor): boolean {
        return this.simulate || !this.invoker.isAvailable(model);
    }

    /** Space live dispatches `pace_ms` apart across all tasks. */
    private async pace(): Promise<void> {
        const now = this.clock().getTime();
        const startAt = Math.max(now, this.nextDispatchAt);
        this.nextDispatchAt = startAt + this.settings.pace_ms;
        if (startAt > now) await this.sleep(startAt - now);
    }

    private limitFor(provider: ProviderName): Limit {
        let limit = this.providerLimits.get(provider);
        if (!limit) {
            limit = pLimit(this.settings.per_provider_concurrency);
            this.providerLimits.set(provider, limit);
        }
        return limit;
    }

    private promptFor(session: SessionState, combination: Combination): string {
        return buildPrompt(
            this.requireInstruction(session, combination),
            this.requireQuery(session, combination),
            this.domainOf(session, combination),
        );
    }

    private requireModel(session: SessionState, combination: Combination): ModelDescriptor {
        const model = session.model(combination.model_id);
        if (!model) throw new StateIntegrityError(combination.id, `unknown model "${combination.model_id}"`);
        return model;
    }

    private requireInstruction(session: SessionState, combination: Combination): InstructionTemplate {
        const instruction = session.instruction(combination.instruction_id);
        if (!instruction) {
            throw new StateIntegrityError(combination.id, `unknown instruction "${combination.instruction_id}"`);
        }
        return instruction;
    }

    private requireQuery(session: SessionState, combination: Combination): QueryVariant {
        const query = session.query(combination.query_id);
        if (!query) throw new StateIntegrityError(combination.id, `unknown query "${combination.query_id}"`);
        return query;
    }

    private domainOf(session: SessionState, combination: Combination): Domain | null {
        if (combination.domain_id === null) return null;
        const domain = session.domain(combination.domain_id);
        if (!domain) throw new StateIntegrityError(combination.id, `unknown domain "${combination.domain_id}"`);
        return domain;
    }

    private emitEvent<K extends keyof SchedulerEvents>(event: K, ...args: SchedulerEvents[K]): void {
        this.emit(event, ...args);
    }
}
