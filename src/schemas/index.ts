/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Catalogs
export {
    ProviderName,
    ModelParameters,
    ModelDescriptor,
    InstructionTemplate,
    QueryOrigin,
    QueryVariant,
    Domain,
    Catalogs,
} from "./catalog.js";

// Session state
export {
    SESSION_VERSION,
    ResultStatus,
    Result,
    Score,
    Combination,
    ClusterMethod,
    Cluster,
    SynthesizedIdea,
    SessionDocument,
} from "./session.js";

// Configuration
export {
    CriterionFunction,
    ScoringCriterion,
    ScoringConfig,
    DEFAULT_SCORING_CRITERIA,
    ModelEntry,
    BaseQueryEntry,
    PatternSettings,
    ClusteringSettings,
    SynthesisMethodName,
    FeedbackSettings,
    ExtractionSettings,
    ExecutionSettings,
    EngineConfig,
} from "./config.js";
