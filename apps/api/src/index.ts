import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { getLogger, loadConfig } from "@pdf-kv/core";
import { createApp } from "./app";

// Load env from repo root first, then fill gaps from the working directory
const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("api");
const API_PORT = Number(process.env.API_PORT ?? 3001);

const config = await loadConfig(process.env);
createApp(config).listen(API_PORT, () => {
  logger.info("api.listening", {
    port: API_PORT,
    model: config.ollama.model,
    strategy: config.strategy.kind,
    schema: config.schema.id,
  });
});
