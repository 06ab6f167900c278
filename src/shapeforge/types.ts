import type { z } from "zod";

/**
 * Provider-specific generation options, passed through to the client untouched.
 */
export type ModelSettings = Record<string, unknown>;

/**
 * Named values substituted into a prompt template.
 */
export type PromptValues = Record<string, unknown>;

/**
 * A client that sends rendered prompt text to a text-generation backend and
 * resolves with the backend's text response.
 */
export interface LanguageModel<TSettings = ModelSettings> {
  send(input: string, settings?: TSettings): Promise<string>;
}

/**
 * Whether a response model was already a structured (object) schema or a plain
 * value schema that had to be wrapped.
 */
export type ResponseModelKind = "structured" | "value";

/**
 * A pattern used to find candidate JSON in a response. Strings are compiled
 * with the dot-all flag.
 */
export type MatchPattern = string | RegExp;

/**
 * Formats the error raised for a single candidate into feedback text.
 */
export type CandidateErrorFormatter = (
  error: Error | z.ZodError,
  candidate: string
) => string;

/**
 * Minimal logging contract. `console` satisfies it.
 */
export interface ForgeLogger {
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
}
