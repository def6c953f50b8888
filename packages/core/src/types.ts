export type Backend = "ollama";

export interface SchemaField {
  name: string;
  description?: string;
  label_hints?: string[]; // synonym labels, prompt-only
}

export interface FieldSchema {
  id: string;
  title?: string;
  fields: SchemaField[];
}

export type PromptStrategy =
  | { kind: "exact" }
  | { kind: "synonyms" };

export type FieldValue = string | number | null;

/** One value per schema field, keyed and ordered as the schema lists them. */
export type ExtractionResult = Record<string, FieldValue>;

export interface ExtractedText {
  text: string;
  pages: number;
  warnings: string[];
}

export interface ParseOptions {
  strict?: boolean;
}

export interface ModelClient {
  readonly backend: Backend;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

export type StageName = "extract_text" | "build_prompt" | "complete" | "parse";

/**
 * Wraps one pipeline stage. Must resolve to whatever `next()` resolves to,
 * or throw.
 */
export type StageInterceptor = <T>(stage: StageName, next: () => Promise<T>) => Promise<T>;
