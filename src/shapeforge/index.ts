/**
 * shapeforge - Typed values from free-text language model responses.
 *
 * A Forge renders a prompt describing the wanted JSON shape, finds candidate
 * JSON in the model's reply, validates it with zod and, when nothing
 * validates, asks again with the errors fed back into the prompt.
 */

export {
  Forge,
  type ForgeOptions,
  type ForgeOutputs,
  type GenerateOptions,
} from "./forge.js";

export {
  ChatModelClient,
  type ChatModelClientOptions,
} from "./chat-model.js";

export {
  Prompt,
  DEFAULT_PROMPT,
  RESPONSE_MODEL_TEXT,
  RESPONSE_MODEL_VARIABLE,
  USER_INPUT_VARIABLE,
} from "./prompt.js";

export { ResponseModel, DEFAULT_VALUE_DESCRIPTION } from "./response-model.js";

export { DEFAULT_MATCH_PATTERNS, findPatterns } from "./patterns.js";

export {
  CandidateValidator,
  defaultFormatError,
  type CandidateValidatorOptions,
  type ValidationResult,
} from "./validation.js";

export {
  ForgeError,
  PatternNotFoundError,
  CandidateError,
  CombinedValidationError,
  ResponseNotDerivedError,
  type AttemptError,
} from "./errors.js";

export {
  ForgeConfigSchema,
  DEFAULT_MAX_RETRIES,
  type ForgeConfig,
  type ForgeConfigInput,
} from "./schemas.js";

export {
  type LanguageModel,
  type ModelSettings,
  type PromptValues,
  type ResponseModelKind,
  type MatchPattern,
  type CandidateErrorFormatter,
  type ForgeLogger,
} from "./types.js";
