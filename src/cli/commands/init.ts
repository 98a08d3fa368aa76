import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { DEFAULT_CONFIG_FILE } from "../../core/config.js";
import { templateConfig, templateEnv } from "../templates/index.js";

async function safeWrite(filePath: string, content: string) {
    try {
        await fs.access(filePath);
        p.log.warn(`Skipped ${chalk.cyan(path.basename(filePath))} (already exists)`);
    } catch {
        await fs.writeFile(filePath, content);
    }
}

export async function initCommand(options?: { yes?: boolean }) {
    p.intro(chalk.bgCyan.black(" ideamesh - Initialize Project "));

    const s = p.spinner();

    const cwd = process.cwd();
    const isReady = options?.yes
        ? true
        : await p.confirm({
            message: `Write an ideamesh configuration in ${cwd}?`,
            initialValue: true,
        });

    if (p.isCancel(isReady) || !isReady) {
        p.cancel("Operation cancelled.");
        process.exit(0);
    }

    s.start("Writing configuration...");

    try {
        await safeWrite(path.join(cwd, DEFAULT_CONFIG_FILE), templateConfig());
        await safeWrite(path.join(cwd, ".env.example"), templateEnv());

        s.stop("Configuration written.");

        p.note(
            `1. Review ${chalk.cyan(DEFAULT_CONFIG_FILE)}\n` +
            `2. Copy ${chalk.cyan(".env.example")} to ${chalk.cyan(".env")} and add your provider keys\n` +
            `3. Try it offline: ${chalk.magenta("ideamesh run --simulate --dry-run")}`,
            "Next Steps",
        );

        p.outro(chalk.green("Ready to explore."));
    } catch (err) {
        s.stop("Failed to write configuration.");
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}
