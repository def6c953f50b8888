import { MalformedOutputError, SchemaMismatchError } from "../errors";
import { getLogger } from "../logger";
import type { ExtractionResult, FieldSchema, FieldValue, ParseOptions } from "../types";

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isFieldValue(v: unknown): v is FieldValue {
  return v === null || typeof v === "string" || typeof v === "number";
}

/**
 * Parses the model's JSON object. When the whole text is not JSON, retries
 * on the span from the first "{" to the last "}" (prose around the object).
 */
export function parseJsonObject(raw: string): Record<string, unknown> {
  const whole = tryParseObject(raw);
  if (whole) return whole;

  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start >= 0 && end > start) {
    const inner = tryParseObject(raw.slice(start, end + 1));
    if (inner) return inner;
  }
  throw new MalformedOutputError(raw);
}

export function parseModelOutput(raw: string, schema: FieldSchema, opts: ParseOptions = {}): ExtractionResult {
  const log = getLogger("core").child({ schema_id: schema.id });
  const obj = parseJsonObject(raw);
  const names = schema.fields.map((f) => f.name);
  const known = new Set(names);

  const extra = Object.keys(obj).filter((k) => !known.has(k));
  if (extra.length) {
    if (opts.strict) {
      throw new SchemaMismatchError(`Model returned keys outside the schema: ${extra.join(", ")}`, extra);
    }
    log.warn("parse.extra_keys", { dropped: extra });
  }

  const badTypes = names.filter((n) => Object.hasOwn(obj, n) && !isFieldValue(obj[n]));
  if (badTypes.length) {
    if (opts.strict) {
      throw new SchemaMismatchError(`Model returned non-scalar values for: ${badTypes.join(", ")}`, badTypes);
    }
    log.warn("parse.non_scalar_values", { nulled: badTypes });
  }

  // Own keys only: field names such as "constructor" or "__proto__" must not
  // resolve through Object.prototype.
  const result: ExtractionResult = {};
  const missing: string[] = [];
  for (const name of names) {
    const value = Object.hasOwn(obj, name) ? obj[name] : undefined;
    if (value === undefined) missing.push(name);
    Object.defineProperty(result, name, {
      value: isFieldValue(value) ? value : null,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  if (missing.length) log.debug("parse.missing_keys", { filled_null: missing });
  return result;
}
