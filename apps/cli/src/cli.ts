import minimist from "minimist";
import {
  ConfigurationError,
  createPipeline,
  errorMessage,
  getLogger,
  isExtractionError,
  loadConfig,
  loggingInterceptor,
  type ExtractionResult,
  type PipelineConfig,
} from "@pdf-kv/core";

export const USAGE = `Usage: pdf-kv <file.pdf> [options]

Options:
  --strategy <exact|synonyms>  prompt strategy (PROMPT_STRATEGY)
  --schema <id|path>           field schema id or JSON file (FIELD_SCHEMA)
  --strict                     reject keys outside the schema (SCHEMA_STRICT)
  --model <name>               Ollama model (DEFAULT_MODEL_OLLAMA)
  --host <url>                 Ollama base URL (OLLAMA_HOST)
  --timeout <ms>               request timeout (OLLAMA_TIMEOUT_MS)
  -h, --help                   show this help`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  run?: (config: PipelineConfig, path: string) => Promise<ExtractionResult>;
}

const FLAG_TO_ENV: Record<string, string> = {
  strategy: "PROMPT_STRATEGY",
  schema: "FIELD_SCHEMA",
  model: "DEFAULT_MODEL_OLLAMA",
  host: "OLLAMA_HOST",
  timeout: "OLLAMA_TIMEOUT_MS",
};

function defaultRun(config: PipelineConfig, path: string): Promise<ExtractionResult> {
  const log = getLogger("cli");
  return createPipeline({ ...config, interceptors: [loggingInterceptor(log)] }).run(path);
}

/** Resolves to the process exit code. */
export async function main(argv: string[], io: CliIO): Promise<number> {
  const args = minimist(argv, {
    string: Object.keys(FLAG_TO_ENV),
    boolean: ["strict", "help"],
    alias: { h: "help" },
  });

  if (args.help) {
    io.stdout(USAGE);
    return 0;
  }
  const [file, ...rest] = args._;
  if (!file || rest.length) {
    io.stderr(USAGE);
    return 2;
  }

  const env = { ...io.env };
  for (const [flag, name] of Object.entries(FLAG_TO_ENV)) {
    const value: unknown = args[flag];
    if (typeof value === "string") env[name] = value;
  }
  if (args.strict) env.SCHEMA_STRICT = "true";

  try {
    const config = await loadConfig(env);
    const result = await (io.run ?? defaultRun)(config, String(file));
    io.stdout(JSON.stringify(result, null, 2));
    return 0;
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    if (e instanceof ConfigurationError) return 2;
    if (!isExtractionError(e)) getLogger("cli").error("cli.unexpected", { error: errorMessage(e) });
    return 1;
  }
}
