import { z } from "zod";

export const DEFAULT_MAX_RETRIES = 3;

function isRegExpSource(source: string): boolean {
  try {
    new RegExp(source, "gs");
    return true;
  } catch {
    return false;
  }
}

export const MatchPatternSchema = z
  .union([
    z.string().min(1).refine(isRegExpSource, {
      message: "Invalid regular expression",
    }),
    z.instanceof(RegExp),
  ])
  .describe("A regular expression, or its source text, locating candidate JSON.");

/**
 * Schema for the scalar Forge options. Collaborators (model, response model,
 * logger) are checked by the type system instead.
 */
export const ForgeConfigSchema = z.object({
  prompt: z
    .string()
    .optional()
    .describe("Liquid template for the prompt. The default template is used when omitted."),
  matchPatterns: z
    .union([MatchPatternSchema, z.array(MatchPatternSchema).min(1)])
    .optional()
    .describe("Patterns tried in order to find candidate JSON in a response."),
  maxRetries: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_RETRIES)
    .describe("Total number of attempts, the first one included."),
  raiseOnFailure: z
    .boolean()
    .default(true)
    .describe("Throw when no attempt succeeds. When false, null is returned instead."),
});

export type ForgeConfigInput = z.input<typeof ForgeConfigSchema>;
export type ForgeConfig = z.infer<typeof ForgeConfigSchema>;
