import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors";
import type { FieldSchema } from "../types";
import invoiceV1 from "./invoice.v1.json";
import invoiceV2 from "./invoice.v2.json";

export const schemaFieldSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  label_hints: z.array(z.string().trim().min(1)).optional(),
});

export const fieldSchemaSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().optional(),
    fields: z.array(schemaFieldSchema),
  })
  .superRefine((schema, ctx) => {
    const seen = new Set<string>();
    schema.fields.forEach((f, i) => {
      if (seen.has(f.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field name "${f.name}"`,
          path: ["fields", i, "name"],
        });
      }
      seen.add(f.name);
    });
  });

export function parseFieldSchema(input: unknown, source = "schema"): FieldSchema {
  const parsed = fieldSchemaSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigurationError(`Invalid field schema in ${source}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

const BUILTIN: Record<string, unknown> = {
  "invoice.v1": invoiceV1,
  "invoice.v2": invoiceV2,
};

export const builtinSchemaIds = Object.keys(BUILTIN);

export function getBuiltinSchema(id: string): FieldSchema | null {
  const raw = Object.hasOwn(BUILTIN, id) ? BUILTIN[id] : undefined;
  return raw === undefined ? null : parseFieldSchema(raw, id);
}

/** Resolves a built-in schema id, or reads a JSON schema file. */
export async function loadFieldSchema(idOrPath: string): Promise<FieldSchema> {
  const builtin = getBuiltinSchema(idOrPath);
  if (builtin) return builtin;

  let json: unknown;
  try {
    json = JSON.parse(await readFile(idOrPath, "utf8"));
  } catch (e) {
    throw new ConfigurationError(
      `Unknown field schema "${idOrPath}" (built-ins: ${builtinSchemaIds.join(", ")}): ${errorMessage(e)}`,
      { cause: e },
    );
  }
  return parseFieldSchema(json, idOrPath);
}
