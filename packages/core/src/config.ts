import { z } from "zod";
import { ConfigurationError } from "./errors";
import { loadFieldSchema } from "./schemas";
import type { FieldSchema, ModelClient, PromptStrategy, StageInterceptor } from "./types";

/**
 * Everything one pipeline instance needs. Built once and handed to
 * createPipeline(); nothing here is read from globals afterwards.
 */
export interface PipelineConfig {
  ollama: {
    host: string;
    model: string;
    timeoutMs?: number;
  };
  strategy: PromptStrategy;
  schema: FieldSchema;
  strict: boolean;
  interceptors?: StageInterceptor[];
  /** Replaces the Ollama client built from `ollama`. */
  client?: ModelClient;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

export const pipelineEnvSchema = z.object({
  OLLAMA_HOST: z.string().url().default("http://localhost:11434"),
  DEFAULT_MODEL_OLLAMA: z.string().min(1).default("llama3.2"),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PROMPT_STRATEGY: z.enum(["exact", "synonyms"]).default("synonyms"),
  FIELD_SCHEMA: z.string().min(1).default("invoice.v2"),
  SCHEMA_STRICT: booleanFlag.default("false"),
});

export type PipelineEnv = z.infer<typeof pipelineEnvSchema>;

type EnvSource = Record<string, string | undefined>;

// Blank variables count as unset.
function withoutBlanks(env: EnvSource): EnvSource {
  const out: EnvSource = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v.trim();
  }
  return out;
}

export function parsePipelineEnv(env: EnvSource): PipelineEnv {
  const parsed = pipelineEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigurationError(`Invalid configuration variables: ${fields}`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function loadConfig(env: EnvSource = process.env): Promise<PipelineConfig> {
  const vars = parsePipelineEnv(env);
  return {
    ollama: {
      host: vars.OLLAMA_HOST,
      model: vars.DEFAULT_MODEL_OLLAMA,
      timeoutMs: vars.OLLAMA_TIMEOUT_MS,
    },
    strategy: { kind: vars.PROMPT_STRATEGY },
    schema: await loadFieldSchema(vars.FIELD_SCHEMA),
    strict: vars.SCHEMA_STRICT,
  };
}
