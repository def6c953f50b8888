import { isExtractionError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { StageInterceptor, StageName } from "../types";

/** Runs `fn` inside every interceptor, the first one outermost. */
export function runStage<T>(interceptors: StageInterceptor[], stage: StageName, fn: () => Promise<T>): Promise<T> {
  const chain = interceptors.reduceRight<() => Promise<T>>(
    (next, interceptor) => () => interceptor(stage, next),
    fn,
  );
  return chain();
}

export function loggingInterceptor(log: Logger): StageInterceptor {
  return async (stage, next) => {
    const started = Date.now();
    log.debug("stage.start", { stage });
    try {
      const out = await next();
      log.debug("stage.done", { stage, ms: Date.now() - started });
      return out;
    } catch (e) {
      log.warn("stage.failed", {
        stage,
        ms: Date.now() - started,
        code: isExtractionError(e) ? e.code : "UNEXPECTED",
        error: errorMessage(e),
      });
      throw e;
    }
  };
}
