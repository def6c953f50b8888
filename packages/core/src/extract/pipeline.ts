import type { PipelineConfig } from "../config";
import { extractText, extractTextFromBuffer } from "../ingest/pdf";
import { getLogger } from "../logger";
import type { ExtractedText, ExtractionResult, FieldSchema, ModelClient } from "../types";
import { createOllamaClient } from "./backends/ollama";
import { runStage } from "./interceptors";
import { parseModelOutput } from "./parse";
import { buildPrompt } from "./prompt";

export interface Pipeline {
  readonly client: ModelClient;
  /** PDF path in, schema-conformant record out. Any stage error is rethrown as-is. */
  run(path: string, schema?: FieldSchema): Promise<ExtractionResult>;
  runBuffer(buf: Uint8Array, schema?: FieldSchema): Promise<ExtractionResult>;
}

export function createPipeline(config: PipelineConfig): Pipeline {
  const client = config.client ?? createOllamaClient(config.ollama);
  const interceptors = config.interceptors ?? [];

  async function fromText(load: () => Promise<ExtractedText>, source: string, schema: FieldSchema): Promise<ExtractionResult> {
    const log = getLogger("core").child({ source, schema_id: schema.id });
    log.info("extract.start", { strategy: config.strategy.kind, strict: config.strict, model: client.model });

    const doc = await runStage(interceptors, "extract_text", load);
    const prompt = await runStage(interceptors, "build_prompt", async () => buildPrompt(doc.text, schema, config.strategy));
    const raw = await runStage(interceptors, "complete", () => client.complete(prompt));
    const result = await runStage(interceptors, "parse", async () => parseModelOutput(raw, schema, { strict: config.strict }));

    log.info("extract.done", { pages: doc.pages, warnings: doc.warnings.length, fields: Object.keys(result).length });
    return result;
  }

  return {
    client,
    run(path, schema = config.schema) {
      return fromText(() => extractText(path), path, schema);
    },
    runBuffer(buf, schema = config.schema) {
      return fromText(() => extractTextFromBuffer(buf), "<buffer>", schema);
    },
  };
}
