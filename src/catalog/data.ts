/**
 * Bundled data files (default catalogs, phrase banks, word lists) live in
 * `data/` at the package root and are validated on read.
 */
import fs from "fs";
import type { ZodType } from "zod/v4";

const DATA_DIR = new URL("../../data/", import.meta.url);

const rawCache = new Map<string, unknown>();

/**
 * Read and validate a JSON file from `data/`. The file is read once; every
 * call validates into a fresh value so callers may not share mutations.
 */
export function readDataFile<T>(fileName: string, schema: ZodType<T>): T {
    if (!rawCache.has(fileName)) {
        const content = fs.readFileSync(new URL(fileName, DATA_DIR), "utf-8");
        rawCache.set(fileName, JSON.parse(content));
    }
    return schema.parse(rawCache.get(fileName));
}
