/**
 * Engine Error Classes — one class per failure category of the pipeline.
 *
 * Fatal:       ConfigurationError, StateIntegrityError
 * Recoverable: InvocationError (retried, then recorded as a failed Result),
 *              ScoringError (zero score), ClusteringError (keyword fallback)
 */

/**
 * Invalid or empty catalogs, bad weights, bad budgets. Raised before any
 * combination is executed.
 */
export class ConfigurationError extends Error {
    public readonly field: string;

    constructor(field: string, detail: string) {
        super(`Invalid configuration for "${field}": ${detail}`);
        this.name = "ConfigurationError";
        this.field = field;
    }
}

/**
 * A single Model Invoker call failed. The scheduler retries with backoff and
 * records a failed Result once attempts are exhausted.
 */
export class InvocationError extends Error {
    public readonly modelId: string;
    public readonly attempt: number;

    constructor(modelId: string, attempt: number, detail: string) {
        super(`Invocation of model "${modelId}" failed on attempt ${attempt}: ${detail}`);
        this.name = "InvocationError";
        this.modelId = modelId;
        this.attempt = attempt;
    }
}

/**
 * A criterion heuristic could not score a text. Caught by the Scoring Engine,
 * which assigns the Result a zero score instead.
 */
export class ScoringError extends Error {
    public readonly resultId: string;
    public readonly criterion: string;

    constructor(resultId: string, criterion: string, detail: string) {
        super(`Scoring of result "${resultId}" failed on criterion "${criterion}": ${detail}`);
        this.name = "ScoringError";
        this.resultId = resultId;
        this.criterion = criterion;
    }
}

/**
 * Embedding-based clustering is unavailable. The Cluster Analyzer falls back
 * to keyword-overlap grouping.
 */
export class ClusteringError extends Error {
    constructor(detail: string) {
        super(`Clustering failed: ${detail}`);
        this.name = "ClusteringError";
    }
}

/**
 * The session document violates an invariant (duplicate tuple, dangling
 * reference, malformed shape). Fatal for the load or merge that found it.
 */
export class StateIntegrityError extends Error {
    public readonly identifier: string;

    constructor(identifier: string, detail: string) {
        super(`Session state integrity violation at "${identifier}": ${detail}`);
        this.name = "StateIntegrityError";
        this.identifier = identifier;
    }
}
