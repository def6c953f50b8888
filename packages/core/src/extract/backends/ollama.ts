import { z } from "zod";
import { TransportError, UpstreamError, errorMessage } from "../../errors";
import { getLogger } from "../../logger";
import type { ModelClient } from "../../types";
import { SYSTEM_PROMPT } from "../prompt";

export interface OllamaOptions {
  host: string;
  model: string;
  /** Unset means wait as long as the server takes. */
  timeoutMs?: number;
}

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

function isTimeout(e: unknown): boolean {
  return e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
}

export function createOllamaClient({ host, model, timeoutMs }: OllamaOptions): ModelClient {
  const url = host.replace(/\/$/, "") + "/api/chat";

  async function complete(prompt: string): Promise<string> {
    const log = getLogger("core").child({ backend: "ollama", model });
    log.info("backend.ollama.call", { url, prompt_chars: prompt.length, timeout_ms: timeoutMs });

    let resp: Response;
    try {
      resp = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: prompt },
          ],
          stream: false,
        }),
        signal: timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined,
      });
    } catch (e) {
      if (isTimeout(e)) {
        log.warn("backend.ollama.timeout", { timeout_ms: timeoutMs });
        throw new TransportError("timeout", `Ollama did not answer within ${timeoutMs}ms`, { cause: e });
      }
      log.warn("backend.ollama.exception", { error: errorMessage(e) });
      throw new TransportError("network", `Cannot reach Ollama at ${url}: ${errorMessage(e)}`, { cause: e });
    }

    if (!resp.ok) {
      const body = await resp.text().catch(() => "");
      log.warn("backend.ollama.http_error", { status: resp.status });
      throw new UpstreamError(resp.status, `Ollama HTTP ${resp.status}: ${body.slice(0, 200)}`);
    }

    let data: unknown;
    try {
      data = await resp.json();
    } catch (e) {
      if (isTimeout(e)) {
        throw new TransportError("timeout", `Ollama did not answer within ${timeoutMs}ms`, { cause: e });
      }
      throw new UpstreamError(resp.status, `Ollama returned a non-JSON body: ${errorMessage(e)}`, { cause: e });
    }

    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(resp.status, "Ollama response has no message.content");
    }
    const content = parsed.data.message.content.trim();
    log.debug("backend.ollama.done", { status: resp.status, response_chars: content.length });
    return content;
  }

  return { backend: "ollama", model, complete };
}
