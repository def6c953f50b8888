import { describe, expect, it, vi } from "vitest";
import { MalformedOutputError, NotFoundError, type PipelineConfig } from "@pdf-kv/core";
import { USAGE, main } from "./cli";

function harness(run?: (config: PipelineConfig, path: string) => Promise<Record<string, string | number | null>>) {
  const out: string[] = [];
  const err: string[] = [];
  const io = { stdout: (t: string) => out.push(t), stderr: (t: string) => err.push(t), env: {}, run };
  return { io, out, err };
}

describe("main", () => {
  it("prints the result as pretty JSON with non-ASCII kept", async () => {
    const { io, out, err } = harness(async () => ({ invoice_number: "INV-1", currency: "₹", total_amount: 12 }));

    const code = await main(["invoice.pdf"], io);

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual(['{\n  "invoice_number": "INV-1",\n  "currency": "₹",\n  "total_amount": 12\n}']);
  });

  it("maps flags onto the configuration", async () => {
    const run = vi.fn(async (_config: PipelineConfig, _path: string) => ({ po_number: null }));
    const { io } = harness(run);

    await main(
      ["scan.pdf", "--strategy", "exact", "--schema", "invoice.v1", "--strict", "--model", "qwen2.5", "--timeout", "5000"],
      io,
    );

    const [config, file] = run.mock.calls[0];
    expect(file).toBe("scan.pdf");
    expect(config.strategy).toEqual({ kind: "exact" });
    expect(config.schema.id).toBe("invoice.v1");
    expect(config.strict).toBe(true);
    expect(config.ollama).toEqual({ host: "http://localhost:11434", model: "qwen2.5", timeoutMs: 5000 });
  });

  it("prints usage and exits 2 without a file", async () => {
    const { io, err } = harness();

    expect(await main([], io)).toBe(2);
    expect(err).toEqual([USAGE]);
  });

  it("prints usage on --help", async () => {
    const { io, out } = harness();

    expect(await main(["-h"], io)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("exits 2 on invalid configuration", async () => {
    const { io, err } = harness();

    expect(await main(["a.pdf", "--strategy", "fuzzy"], io)).toBe(2);
    expect(err).toEqual(["Error: Invalid configuration variables: PROMPT_STRATEGY"]);
  });

  it("prints the error and exits 1 when extraction fails", async () => {
    const { io, out, err } = harness(async (_c, p) => Promise.reject(new NotFoundError(p)));

    expect(await main(["invoice.pdf"], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(["Error: PDF not found: invoice.pdf"]);
  });

  it("includes the raw model text for malformed output", async () => {
    const { io, err } = harness(async () => Promise.reject(new MalformedOutputError("no idea")));

    expect(await main(["invoice.pdf"], io)).toBe(1);
    expect(err).toEqual(["Error: Model did not return valid JSON. Raw output:\nno idea"]);
  });
});
