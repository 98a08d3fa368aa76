import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import fs from "fs/promises";
import path from "path";
import { openai } from "@ai-sdk/openai";
import { loadEngineConfig } from "../../core/config.js";
import { SessionState } from "../../core/session.js";
import { resolveCatalogs } from "../../catalog/defaults.js";
import { runPipeline } from "../../pipeline.js";
import type { PipelineReport, RunSelection } from "../../pipeline.js";
import type { EngineConfig } from "../../schemas/config.js";
import { AiSdkModelInvoker } from "../../llm/invoker.js";
import { AiSdkEmbedder } from "../../llm/embedder.js";
import type { Embedder } from "../../llm/embedder.js";
import { LLMClient } from "../../llm/client.js";
import { hasProviderCredentials, resolveLanguageModel } from "../../llm/resolve.js";
import { ExtractiveComposer, FallbackComposer, ModelComposer } from "../../synthesis/index.js";
import type { IdeaComposer } from "../../synthesis/index.js";
import { formatIdeas } from "../../output/format.js";
import {
    DEFAULT_MAX_COMBINATIONS,
    applyOverrides,
    buildSelection,
    parseCount,
    parseOutputFormat,
    parseSynthesisMethods,
} from "../selection.js";
import type { RunFlags } from "../selection.js";

async function loadSession(statePath: string | undefined): Promise<SessionState> {
    if (!statePath) return SessionState.create();
    try {
        await fs.access(statePath);
    } catch {
        p.log.warn(`No state file at ${chalk.cyan(statePath)}; starting a new session.`);
        return SessionState.create();
    }
    const session = await SessionState.load(statePath);
    p.log.info(`Loaded session ${chalk.cyan(session.sessionId)} with ${session.combinations.length} combinations.`);
    return session;
}

function createEmbedder(config: EngineConfig, simulate: boolean): Embedder | undefined {
    const { embedding } = config.evaluation_settings.clustering;
    if (simulate || embedding.provider !== "openai" || !hasProviderCredentials("openai")) return undefined;
    return new AiSdkEmbedder(openai.embedding(process.env.IDEAMESH_EMBEDDING_MODEL ?? embedding.model));
}

/** A model-backed composer on the first selected model that has credentials. */
function createComposer(selection: RunSelection, simulate: boolean): IdeaComposer | undefined {
    if (simulate) return undefined;
    const model = selection.models.find((entry) => entry.provider !== "simulated" && hasProviderCredentials(entry.provider));
    if (!model) return undefined;
    const composer = new ModelComposer(new LLMClient(resolveLanguageModel(model.provider, model.model)));
    return new FallbackComposer(composer, new ExtractiveComposer(), (error) => {
        p.log.warn(`Idea composition through ${model.id} failed (${error.message}); using extracted sentences.`);
    });
}

function reportDryRun(report: PipelineReport): void {
    const { planned } = report.execution;
    p.log.step(`Generated ${chalk.bold(String(report.generated.length))} new combinations.`);
    for (const entry of planned) {
        const mode = entry.mode === "live" ? chalk.green(entry.mode) : chalk.yellow(entry.mode);
        p.log.message(`${chalk.cyan(entry.combination_id)} ${chalk.dim(`[${entry.provider}]`)} ${mode}`);
    }
    p.log.info(`${planned.length} combinations would execute.`);
}

function reportRun(report: PipelineReport): void {
    const { execution } = report;
    p.log.step(`Generated ${chalk.bold(String(report.generated.length))} new combinations.`);
    p.log.info(
        `Executed ${execution.executed}: ${chalk.green(`${execution.succeeded} succeeded`)}, ` +
        `${chalk.red(`${execution.failed} failed`)}, ${chalk.yellow(`${execution.simulated} simulated`)}`,
    );
    if (execution.skipped > 0) p.log.warn(`${execution.skipped} combinations were skipped.`);
    if (report.interrupted) return;

    p.log.info(`Scored ${report.scored} results (scoring revision ${report.scoring.revision}).`);
    const analysis = report.clusterAnalysis;
    if (analysis) {
        const method = analysis.method === "kmeans" ? "k-means" : "keyword overlap";
        p.log.info(`Formed ${analysis.clusters.length} clusters by ${method}.`);
        for (const cluster of analysis.clusters) {
            p.log.message(`${chalk.cyan(cluster.id)} ${cluster.label} ${chalk.dim(`(${cluster.member_result_ids.length} results)`)}`);
        }
    }
    p.log.success(`Synthesized ${report.ideas.length} ideas.`);
    if (report.feedback?.changed) {
        const added = report.feedback.added.length > 0 ? `; added ${report.feedback.added.join(", ")}` : "";
        p.log.info(`Scoring updated to revision ${report.feedback.scoring.revision}${added}.`);
    }
}

export async function runCommand(flags: RunFlags) {
    p.intro(chalk.bgMagenta.black(" ideamesh - Run "));

    const controller = new AbortController();
    const onInterrupt = () => {
        controller.abort();
        p.log.warn("Interrupt received; stopping after the combinations in flight.");
    };
    process.once("SIGINT", onInterrupt);

    const executing = ora();
    const warn = (message: string) => {
        if (executing.isSpinning) {
            executing.clear();
            p.log.warn(message);
            executing.render();
        } else {
            p.log.warn(message);
        }
    };

    try {
        const config = applyOverrides(await loadEngineConfig(flags.config), flags);
        const selection = buildSelection(resolveCatalogs(config), flags);
        const maxCombinations = parseCount(flags.maxCombinations, "--max-combinations") ?? DEFAULT_MAX_COMBINATIONS;
        const synthesisMethods = parseSynthesisMethods(flags.synthesizeMethod);
        const outputFormat = parseOutputFormat(flags.outputFormat, config);
        const simulate = flags.simulate ?? false;
        const dryRun = flags.dryRun ?? false;

        p.log.info(
            `${selection.models.length} models × ${selection.instructions.length} instructions × ` +
            `${selection.queries.length} queries × ${selection.domains.length} domains, budget ${maxCombinations}`,
        );
        if (simulate) p.log.info(chalk.yellow("Simulation mode: no provider will be called."));

        const session = await loadSession(flags.loadState);
        const statePath = flags.saveState ?? flags.loadState;

        // Saves are serialized.
        let saving: Promise<void> = Promise.resolve();
        const persist = (): Promise<void> => {
            if (!statePath) return saving;
            saving = saving.then(() => session.save(statePath));
            return saving;
        };

        let executed = 0;
        const report = await runPipeline({
            session,
            config,
            selection,
            invoker: new AiSdkModelInvoker(),
            embedder: createEmbedder(config, simulate),
            composer: createComposer(selection, simulate),
            maxCombinations,
            balanced: flags.balancedModels ?? false,
            simulate,
            dryRun,
            synthesisMethods,
            signal: controller.signal,
            onPhaseChange: (phase) => {
                if (phase === "execution" && !dryRun) {
                    executing.start(`Executing ${session.pending().length} combinations...`);
                    return;
                }
                if (executing.isSpinning) executing.succeed(chalk.green(`Executed ${executed} combinations.`));
                p.log.step(chalk.blue(phase));
            },
            onCombinationExecuted: (combination, result) => {
                executed++;
                const status = result.status === "succeeded" ? chalk.green(result.status) : chalk.red(result.status);
                executing.text = `${executed} executed, last ${chalk.cyan(combination.id)} ${status}`;
                return dryRun ? undefined : persist();
            },
            onWarning: warn,
        });
        if (executing.isSpinning) executing.stop();

        if (report.dryRun) {
            reportDryRun(report);
            p.outro("Dry run complete; nothing was executed or saved.");
            return;
        }

        reportRun(report);
        if (statePath) {
            await persist();
            p.log.success(`Session saved to ${chalk.cyan(statePath)}`);
        }

        if (report.interrupted) {
            p.outro(chalk.yellow("Run interrupted; executed results are kept."));
            return;
        }

        const output = formatIdeas(report.ideas, outputFormat);
        if (flags.outputFile) {
            await fs.mkdir(path.dirname(path.resolve(flags.outputFile)), { recursive: true });
            await fs.writeFile(flags.outputFile, output);
            p.log.success(`Ideas written to ${chalk.cyan(flags.outputFile)}`);
            p.outro("Exploration finished.");
        } else {
            p.outro("Exploration finished.");
            process.stdout.write(output);
        }
    } catch (err) {
        if (executing.isSpinning) executing.fail(chalk.red("Execution stopped."));
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    } finally {
        process.off("SIGINT", onInterrupt);
    }
}
