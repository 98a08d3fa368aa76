/**
 * ideamesh — Public API
 *
 * Combinatorial idea exploration: fan one problem out across models,
 * instruction styles, query variants and domains, then score, cluster and
 * synthesize the responses with per-model provenance.
 */

// Core
export {
    SessionState,
    validateIntegrity,
    migrateSessionDocument,
    generateCombinations,
    ExecutionScheduler,
    retryWithBackoff,
    buildPrompt,
    simulateResponse,
    tupleKey,
    loadEngineConfig,
    parseEngineConfig,
} from "./core/index.js";
export type { GeneratorInput, ExecutionSummary, PlanEntry, SchedulerEvents, RetryPolicy } from "./core/index.js";

// Schemas
export {
    // Catalogs
    ProviderName,
    ModelDescriptor,
    InstructionTemplate,
    QueryVariant,
    Domain,
    Catalogs,
    // Session
    Result,
    Score,
    Combination,
    Cluster,
    SynthesizedIdea,
    SessionDocument,
    // Config
    ScoringConfig,
    ScoringCriterion,
    EngineConfig,
} from "./schemas/index.js";

// Catalogs
export { resolveCatalogs, searchDomains, queryFromText } from "./catalog/defaults.js";
export { generateVariations } from "./catalog/variations.js";

// Evaluation
export { ScoringEngine, rankResults } from "./evaluation/scoring.js";
export { detectPatterns } from "./evaluation/patterns.js";
export { analyzeClusters, kMeans } from "./evaluation/clustering.js";
export { applyFeedback } from "./evaluation/feedback.js";

// Synthesis
export { synthesize, ExtractiveComposer, ModelComposer, FallbackComposer } from "./synthesis/index.js";
export type { SynthesisMethod, IdeaComposer } from "./synthesis/index.js";

// LLM
export { LLMClient, AiSdkModelInvoker, AiSdkEmbedder, resolveLanguageModel } from "./llm/index.js";
export type { ModelInvoker, Embedder } from "./llm/index.js";

// Output
export { formatIdeas } from "./output/format.js";

// Errors
export {
    ConfigurationError,
    InvocationError,
    ScoringError,
    ClusteringError,
    StateIntegrityError,
} from "./errors/index.js";

// Orchestration
export { runPipeline } from "./pipeline.js";
export type { PipelineOptions, PipelineReport, RunSelection } from "./pipeline.js";
