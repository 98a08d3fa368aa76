export { SessionState, validateIntegrity } from "./session.js";
export type { NewCombination, SessionStateOptions } from "./session.js";
export { migrateSessionDocument } from "./migrate.js";
export { generateCombinations } from "./generator.js";
export type { GeneratorInput } from "./generator.js";
export { ExecutionScheduler } from "./scheduler.js";
export type { ExecutionSchedulerOptions, ExecutionSummary, PlanEntry, SchedulerEvents } from "./scheduler.js";
export { backoffDelay, defaultSleep, retryWithBackoff } from "./retry.js";
export type { RetryOutcome, RetryPolicy, Sleep } from "./retry.js";
export { buildPrompt, fillTemplate } from "./prompt.js";
export { simulateResponse } from "./simulate.js";
export { NO_DOMAIN, tupleKey } from "./tuple.js";
export { DEFAULT_CONFIG_FILE, loadEngineConfig, parseEngineConfig } from "./config.js";
