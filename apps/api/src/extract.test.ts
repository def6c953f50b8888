import { beforeEach, describe, expect, it, vi } from "vitest";

const getDocument = vi.hoisted(() => vi.fn());
vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({ getDocument }));

import {
  CorruptDocumentError,
  NotFoundError,
  TransportError,
  UpstreamError,
  getBuiltinSchema,
  type ModelClient,
  type PipelineConfig,
} from "@pdf-kv/core";
import { handleExtract, problemFor } from "./extract";

const pdfBytes = Buffer.from("%PDF-1.7\n", "latin1");

function configWith(content: string): { config: PipelineConfig; prompts: string[] } {
  const prompts: string[] = [];
  const client: ModelClient = {
    backend: "ollama",
    model: "fake-model",
    complete: async (prompt) => {
      prompts.push(prompt);
      return content;
    },
  };
  const schema = getBuiltinSchema("invoice.v2");
  if (!schema) throw new Error("invoice.v2 missing");
  return {
    prompts,
    config: { ollama: { host: "http://localhost:11434", model: "fake-model" }, strategy: { kind: "synonyms" }, schema, strict: false, client },
  };
}

beforeEach(() => {
  getDocument.mockReset();
  getDocument.mockImplementation(() => ({
    promise: Promise.resolve({
      numPages: 1,
      getPage: async () => ({
        getTextContent: async () => ({ items: [{ str: "Bill No 42", transform: [10, 0, 0, 10, 10, 700], width: 50 }], styles: {} }),
      }),
      destroy: async () => undefined,
    }),
  }));
});

describe("problemFor", () => {
  it.each([
    [new NotFoundError("a.pdf"), 404, "NOT_FOUND"],
    [new CorruptDocumentError("bad"), 422, "CORRUPT_DOCUMENT"],
    [new UpstreamError(500, "boom"), 502, "UPSTREAM"],
    [new TransportError("timeout", "slow"), 504, "TRANSPORT"],
    [new Error("what"), 500, "INTERNAL"],
  ])("maps %s to %i", (error, status, code) => {
    expect(problemFor(error)).toMatchObject({ status, code, detail: error.message });
  });
});

describe("handleExtract", () => {
  it("returns the record and the settings it was produced with", async () => {
    const { config } = configWith('{"invoice_number": "42"}');

    const out = await handleExtract(pdfBytes, {}, config);

    expect(out).toEqual({
      status: 200,
      body: {
        result: {
          invoice_number: "42",
          invoice_date: null,
          customer_name: null,
          total_amount: null,
          tax_amount: null,
          currency: null,
        },
        stats: { model: "fake-model", strategy: "synonyms", schema: "invoice.v2", strict: false },
      },
    });
  });

  it("applies per-request schema, strategy and strictness", async () => {
    const { config, prompts } = configWith('{"invoice_number": "42", "po": "x"}');

    const out = await handleExtract(pdfBytes, { schema: "invoice.v1", strategy: "exact", strict: "true" }, config);

    expect(out.status).toBe(502);
    expect(out.body).toMatchObject({ code: "SCHEMA_MISMATCH" });
    expect(prompts[0]).toContain("Required keys:");
  });

  it("rejects an empty body", async () => {
    const { config } = configWith("{}");

    const out = await handleExtract({}, {}, config);

    expect(out.status).toBe(400);
    expect(getDocument).not.toHaveBeenCalled();
  });

  it("rejects unknown query values", async () => {
    const { config } = configWith("{}");

    expect((await handleExtract(pdfBytes, { strategy: "fuzzy" }, config)).status).toBe(400);
    expect((await handleExtract(pdfBytes, { schema: "receipt.v1" }, config)).status).toBe(400);
  });

  it("reports unparseable PDFs as 422", async () => {
    getDocument.mockImplementation(() => ({ promise: Promise.reject(new Error("Invalid PDF structure.")) }));
    const { config, prompts } = configWith("{}");

    const out = await handleExtract(pdfBytes, {}, config);

    expect(out.status).toBe(422);
    expect(prompts).toEqual([]);
  });
});
