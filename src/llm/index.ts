export { LLMClient } from "./client.js";
export type { GenerateOptions, ObjectResult, TextResult } from "./client.js";
export { PROVIDER_API_KEYS, hasProviderCredentials, inferProviderFromName, resolveLanguageModel } from "./resolve.js";
export { AiSdkModelInvoker } from "./invoker.js";
export type { AiSdkModelInvokerOptions, InvocationResponse, ModelInvoker } from "./invoker.js";
export { AiSdkEmbedder, DEFAULT_EMBEDDING_MODEL } from "./embedder.js";
export type { Embedder } from "./embedder.js";
