import { ConfigurationError } from "../errors";
import type { FieldSchema, PromptStrategy } from "../types";

export const SYSTEM_PROMPT = "You extract structured data and respond ONLY with JSON.";

/** Three quotes, or one more than the longest run of quotes in the text. */
export function documentFence(text: string): string {
  const longest = Math.max(0, ...(text.match(/"+/g) ?? []).map((run) => run.length));
  return '"'.repeat(Math.max(3, longest + 1));
}

function exactInstructions(schema: FieldSchema): string[] {
  return [
    "You are an information extraction assistant.",
    "",
    "You will be given the text content of a PDF document (such as an invoice, form, or statement).",
    "Your task is to extract the following key fields and return a STRICT JSON object only, with no extra text:",
    "",
    "Required keys:",
    ...schema.fields.map((f) => `- "${f.name}"`),
  ];
}

function synonymInstructions(schema: FieldSchema): string[] {
  return [
    "You are an expert invoice document extraction assistant.",
    "Invoices come from different vendors and fields may appear with different label names, abbreviations, or synonyms.",
    "",
    "Your task is to extract the required standardized fields below.",
    "Map semantically similar terms to the correct JSON key even if the wording differs.",
    "",
    "Standard JSON Keys & Example Synonyms:",
    "",
    ...schema.fields.map((f, i) => {
      const hints = f.label_hints ?? [];
      const key = `${i + 1}. "${f.name}"`;
      return hints.length ? `${key} → ${hints.join(", ")}` : key;
    }),
  ];
}

function instructionsFor(schema: FieldSchema, strategy: PromptStrategy): string[] {
  switch (strategy.kind) {
    case "exact":
      return exactInstructions(schema);
    case "synonyms":
      return [
        ...synonymInstructions(schema),
        "",
        "Extract values based on semantic meaning, not exact keyword matching.",
      ];
  }
}

const OUTPUT_RULES = [
  "Rules:",
  "- Output MUST be ONLY a valid JSON object containing exactly the keys above.",
  "- If a field is missing or not clearly available, set its value to null.",
  "- Do NOT include any additional keys.",
  "- Do NOT add explanations or any text outside the JSON object.",
];

/**
 * Renders the user turn for one document. The document body goes last,
 * fenced, so its content cannot be read as instructions.
 */
export function buildPrompt(text: string, schema: FieldSchema, strategy: PromptStrategy): string {
  if (schema.fields.length === 0) {
    throw new ConfigurationError(`Field schema "${schema.id}" has no fields`);
  }

  const fence = documentFence(text);
  return [
    ...instructionsFor(schema, strategy),
    "",
    ...OUTPUT_RULES,
    "",
    "DOCUMENT CONTENT:",
    fence,
    text,
    fence,
  ].join("\n");
}
