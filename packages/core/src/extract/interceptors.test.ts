import { describe, expect, it } from "vitest";
import { TransportError } from "../errors";
import { getLogger, type LogEntry } from "../logger";
import { loggingInterceptor, runStage } from "./interceptors";

function capture() {
  const entries: LogEntry[] = [];
  const log = getLogger("test", { level: "trace", sink: (entry) => entries.push(entry) });
  return { entries, log };
}

describe("runStage", () => {
  it("calls the stage directly without interceptors", async () => {
    await expect(runStage([], "parse", async () => 42)).resolves.toBe(42);
  });
});

describe("loggingInterceptor", () => {
  it("logs start and completion of a stage and passes the result through", async () => {
    const { entries, log } = capture();

    const out = await runStage([loggingInterceptor(log)], "build_prompt", async () => "prompt");

    expect(out).toBe("prompt");
    expect(entries.map((e) => [e.level, e.msg, e.stage])).toEqual([
      ["debug", "stage.start", "build_prompt"],
      ["debug", "stage.done", "build_prompt"],
    ]);
    expect(typeof entries[1].ms).toBe("number");
  });

  it("logs the error code of a failed stage and rethrows it", async () => {
    const { entries, log } = capture();
    const failure = new TransportError("timeout", "too slow");

    await expect(
      runStage([loggingInterceptor(log)], "complete", async () => Promise.reject(failure)),
    ).rejects.toBe(failure);

    expect(entries[1]).toMatchObject({ level: "warn", msg: "stage.failed", stage: "complete", code: "TRANSPORT", error: "too slow" });
  });
});
