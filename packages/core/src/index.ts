export * from "./types";
export * from "./errors";
export * from "./config";
export { extractText, extractTextFromBuffer, PAGE_SEPARATOR } from "./ingest/pdf";
export { buildPrompt, SYSTEM_PROMPT } from "./extract/prompt";
export { createOllamaClient } from "./extract/backends/ollama";
export type { OllamaOptions } from "./extract/backends/ollama";
export { parseModelOutput, parseJsonObject } from "./extract/parse";
export { createPipeline } from "./extract/pipeline";
export type { Pipeline } from "./extract/pipeline";
export { loggingInterceptor } from "./extract/interceptors";
export { builtinSchemaIds, getBuiltinSchema, loadFieldSchema, parseFieldSchema } from "./schemas";
export { getLogger } from "./logger";
export type { Logger, LogEntry, Level } from "./logger";
