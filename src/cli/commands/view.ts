import * as p from "@clack/prompts";
import chalk from "chalk";
import { SessionState } from "../../core/session.js";
import { rankResults } from "../../evaluation/scoring.js";
import { formatContributions, sessionStats } from "../../output/format.js";
import { parseCount } from "../selection.js";

interface ViewOptions {
    top?: string;
    criterion?: string;
}

const DEFAULT_TOP = 5;
const PREVIEW_LENGTH = 160;

function preview(text: string): string {
    const flat = text.replace(/\s+/g, " ").trim();
    return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH - 1)}…` : flat;
}

export async function viewCommand(statePath: string, options: ViewOptions) {
    p.intro(chalk.bgBlue.black(" ideamesh - View Session "));

    try {
        const session = await SessionState.load(statePath);
        const top = parseCount(options.top, "--top") ?? DEFAULT_TOP;
        const criterion = options.criterion ?? "overall";

        const stats = sessionStats(session.combinations, session.clusters.length, session.ideas.length, session.runCount);
        p.note(
            `Session:      ${chalk.cyan(session.sessionId)}\n` +
            `Runs:         ${stats.runs}\n` +
            `Combinations: ${stats.combinations} (${stats.pending} pending)\n` +
            `Results:      ${chalk.green(`${stats.succeeded} succeeded`)}, ${chalk.red(`${stats.failed} failed`)}, ${chalk.yellow(`${stats.simulated} simulated`)}\n` +
            `Scored:       ${stats.scored}\n` +
            `Clusters:     ${stats.clusters}\n` +
            `Ideas:        ${stats.ideas}`,
            "Summary",
        );

        const ranked = rankResults(session.combinations, criterion, top);
        if (ranked.length === 0) {
            p.log.warn(criterion === "overall" ? "No scored results yet." : `No results scored on "${criterion}".`);
        } else {
            p.log.step(chalk.bold(`Top ${ranked.length} results by ${criterion}`));
            ranked.forEach((entry, index) => {
                p.log.message(
                    `${index + 1}. ${chalk.cyan(entry.combination.id)} ${chalk.bold(entry.value.toFixed(3))}\n` +
                    chalk.dim(preview(entry.result.text)),
                );
            });
        }

        if (session.ideas.length > 0) {
            p.log.step(chalk.bold("Synthesized ideas"));
            for (const idea of session.ideas) {
                p.log.message(
                    `${chalk.magenta(idea.title)} ${chalk.dim(`[${idea.method}, run ${idea.run}]`)}\n` +
                    `Average score ${idea.average_score.toFixed(3)}; ${formatContributions(idea.contributions)}`,
                );
            }
        }

        p.outro("Done.");
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}
