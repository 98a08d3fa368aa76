#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();


import { Command } from "commander";
import { initCommand, runCommand, viewCommand } from "./commands/index.js";

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

const program = new Command();

program
    .name("ideamesh")
    .description("Explore ideas across model, instruction, query and domain combinations")
    .version("1.0.0");

program
    .command("init")
    .description("Write a starter ideamesh.config.json and .env.example in the current directory")
    .option("-y, --yes", "Skip confirmation prompts")
    .action(initCommand);

program
    .command("run")
    .description("Generate, execute, score, cluster and synthesize combinations")
    .option("-c, --config <path>", "Configuration file (default: ./ideamesh.config.json)")
    .option("-q, --query <text>", "Base query to explore instead of the configured queries")
    .option("--variant <text>", "Extra query variant written by hand (repeatable)", collect, [])
    .option("--variations <number>", "Generated variations per base query", "0")
    .option("-d, --domain <term>", "Only domains matching this name or keyword")
    .option("--without-domain", "Run without domain grounding")
    .option("-m, --models <number>", "Use the first N models")
    .option("-i, --instructions <number>", "Use the first N instruction templates")
    .option("-n, --max-combinations <number>", "New combinations to generate this run")
    .option("--balanced-models", "Spread the budget evenly across models")
    .option("--simulate", "Use simulated responses instead of calling providers")
    .option("--dry-run", "Show what would execute without executing or saving")
    .option("--synthesize-method <method>", "cluster_based, cross_pollination or refinement (repeatable)", collect, [])
    .option("--concurrency <number>", "Combinations executed in parallel")
    .option("--load-state <path>", "Session state file to continue")
    .option("--save-state <path>", "Where to save the session (default: --load-state)")
    .option("--output-format <format>", "markdown or json")
    .option("-o, --output-file <path>", "Write ideas to a file instead of stdout")
    .action(runCommand);

program
    .command("view")
    .description("Summarize a saved session: results, top scores and ideas")
    .argument("<state>", "Session state file")
    .option("-t, --top <number>", "Number of top results to show")
    .option("--criterion <name>", "Rank by a scoring criterion instead of the aggregate")
    .action(viewCommand);

program.parse(process.argv);
