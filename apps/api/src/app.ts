import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { getLogger, loggingInterceptor, type PipelineConfig } from "@pdf-kv/core";
import { handleExtract, problemFor } from "./extract";

export function createApp(config: PipelineConfig) {
  const app = express();
  const logger = getLogger("api");

  app.use(cors());
  app.use(helmet());
  // only failed requests are worth a line
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req, res, next) => {
    const header = req.headers["x-request-id"];
    const reqId = typeof header === "string" && header ? header : uuidv4();
    res.locals.reqId = reqId;
    res.setHeader("x-request-id", reqId);
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/extract", express.raw({ type: "application/pdf", limit: "10mb" }), async (req, res, next) => {
    const reqId = String(res.locals.reqId);
    const log = logger.child({ req_id: reqId });
    try {
      const out = await handleExtract(req.body, req.query, {
        ...config,
        interceptors: [...(config.interceptors ?? []), loggingInterceptor(log)],
      });
      log.info("extract.response", { status: out.status });
      if (out.status === 200) {
        res.status(200).json(out.body);
      } else {
        res.status(out.status).type("application/problem+json").send(JSON.stringify(out.body));
      }
    } catch (e) {
      next(e);
    }
  });

  // body-parser failures (e.g. 413) and anything unexpected
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    const problem = { ...problemFor(err), status };
    logger.error("api.unhandled", { status, error: problem.detail });
    res.status(status).type("application/problem+json").send(JSON.stringify(problem));
  });

  return app;
}
