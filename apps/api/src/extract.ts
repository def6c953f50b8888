import { z } from "zod";
import {
  createPipeline,
  errorMessage,
  getBuiltinSchema,
  isExtractionError,
  type ExtractionErrorCode,
  type ExtractionResult,
  type PipelineConfig,
} from "@pdf-kv/core";

export type ProblemDetails = {
  title: string;
  detail: string;
  status: number;
  code: ExtractionErrorCode | "BAD_REQUEST" | "INTERNAL";
};

export type HandlerResponse =
  | { status: 200; body: { result: ExtractionResult; stats: ExtractStats } }
  | { status: number; body: ProblemDetails };

export interface ExtractStats {
  model: string;
  strategy: string;
  schema: string;
  strict: boolean;
}

const STATUS_BY_CODE: Record<ExtractionErrorCode, { status: number; title: string }> = {
  NOT_FOUND: { status: 404, title: "Document not found" },
  CORRUPT_DOCUMENT: { status: 422, title: "Unreadable PDF" },
  MALFORMED_OUTPUT: { status: 502, title: "Model output is not JSON" },
  SCHEMA_MISMATCH: { status: 502, title: "Model output does not match the schema" },
  UPSTREAM: { status: 502, title: "Model endpoint error" },
  TRANSPORT: { status: 504, title: "Model endpoint unreachable" },
  CONFIGURATION: { status: 500, title: "Server misconfigured" },
};

export function problemFor(e: unknown): ProblemDetails {
  if (isExtractionError(e)) {
    const { status, title } = STATUS_BY_CODE[e.code];
    return { title, detail: e.message, status, code: e.code };
  }
  return { title: "Internal error", detail: errorMessage(e), status: 500, code: "INTERNAL" };
}

export const extractQuerySchema = z.object({
  schema: z.string().min(1).optional(),
  strategy: z.enum(["exact", "synonyms"]).optional(),
  strict: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
});

function badRequest(detail: string): HandlerResponse {
  return { status: 400, body: { title: "Bad request", detail, status: 400, code: "BAD_REQUEST" } };
}

/**
 * Query parameters may pick a built-in schema and override strategy and
 * strictness for one request; the server config stays untouched.
 */
export async function handleExtract(
  body: unknown,
  query: unknown,
  config: PipelineConfig,
): Promise<HandlerResponse> {
  if (!(body instanceof Uint8Array) || body.byteLength === 0) {
    return badRequest("Send the PDF as the request body with Content-Type: application/pdf");
  }
  const q = extractQuerySchema.safeParse(query);
  if (!q.success) {
    return badRequest(q.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }

  let schema = config.schema;
  if (q.data.schema) {
    const builtin = getBuiltinSchema(q.data.schema);
    if (!builtin) return badRequest(`Unknown schema "${q.data.schema}"`);
    schema = builtin;
  }
  const effective: PipelineConfig = {
    ...config,
    schema,
    strategy: q.data.strategy ? { kind: q.data.strategy } : config.strategy,
    strict: q.data.strict ?? config.strict,
  };

  try {
    const pipeline = createPipeline(effective);
    const result = await pipeline.runBuffer(body);
    return {
      status: 200,
      body: {
        result,
        stats: { model: pipeline.client.model, strategy: effective.strategy.kind, schema: schema.id, strict: effective.strict },
      },
    };
  } catch (e) {
    const problem = problemFor(e);
    return { status: problem.status, body: problem };
  }
}
