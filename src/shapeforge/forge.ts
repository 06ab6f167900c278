import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { v4 as uuidv4 } from "uuid";
import type { z } from "zod";

import {
  ForgeError,
  ResponseNotDerivedError,
  type AttemptError,
} from "./errors.js";
import { DEFAULT_MATCH_PATTERNS, findPatterns } from "./patterns.js";
import { Prompt, RESPONSE_MODEL_VARIABLE, USER_INPUT_VARIABLE } from "./prompt.js";
import { ResponseModel } from "./response-model.js";
import { ForgeConfigSchema } from "./schemas.js";
import type {
  CandidateErrorFormatter,
  ForgeLogger,
  LanguageModel,
  MatchPattern,
  ModelSettings,
  PromptValues,
} from "./types.js";
import { silentLogger, withFeedback } from "./utils.js";
import { CandidateValidator } from "./validation.js";

// prepare, send, extract and validate: one graph step each per attempt
const STEPS_PER_ATTEMPT = 4;

/**
 * Options for creating a Forge.
 */
export interface ForgeOptions<T, TSettings = ModelSettings> {
  /** The client used to send prompts */
  model: LanguageModel<TSettings>;
  /** Zod schema of the value to return, an object schema or any other type */
  responseModel: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Liquid template for the prompt; the default extraction prompt if omitted */
  prompt?: string;
  /** Patterns tried in order to find candidate JSON in a response */
  matchPatterns?: MatchPattern | readonly MatchPattern[];
  /** Total number of attempts, the first one included. Defaults to 3. */
  maxRetries?: number;
  /** Throw when every attempt fails; return null instead when false. Defaults to true. */
  raiseOnFailure?: boolean;
  /** Formats each failing candidate's error into retry feedback */
  formatError?: CandidateErrorFormatter;
  logger?: ForgeLogger;
}

/**
 * Per-call inputs besides the user input.
 */
export interface GenerateOptions<TSettings = ModelSettings> {
  /** Values for variables referenced by the prompt template */
  promptValues?: PromptValues;
  /** Passed to the model's `send` as is */
  modelSettings?: TSettings;
}

/**
 * Result of a Forge run.
 */
export interface ForgeOutputs<T> {
  /** The validated value, or null when every attempt failed and raising is off */
  value: T | null;
  attempts: number;
  /** The last prompt sent, with the final feedback appended on failure */
  prompt: string;
  /** The candidate text the value was parsed from */
  candidate?: string;
  runId: string;
}

interface ForgeRequest<TSettings> extends GenerateOptions<TSettings> {
  runId: string;
  userInput: string;
}

type AttemptOutcome<T> =
  | { status: "pending" }
  | { status: "success"; value: T; candidate: string }
  | { status: "failed"; error: AttemptError };

function createForgeState<T, TSettings>() {
  return Annotation.Root({
    request: Annotation<ForgeRequest<TSettings>>,
    prompt: Annotation<string>,
    response: Annotation<string>,
    candidates: Annotation<string[]>,
    attempts: Annotation<number>({
      reducer: (curr, update) => (curr || 0) + update,
      default: () => 0,
    }),
    outcome: Annotation<AttemptOutcome<T>>({
      reducer: (_curr, update) => update,
      default: () => ({ status: "pending" }),
    }),
  });
}

interface ForgeGraphDeps<T, TSettings> {
  model: LanguageModel<TSettings>;
  prompt: Prompt;
  responseModel: ResponseModel<T>;
  validator: CandidateValidator<T>;
  matchPatterns: MatchPattern | readonly MatchPattern[];
  maxRetries: number;
  logger: ForgeLogger;
}

/**
 * Build the retry loop: prepare -> send -> extract -> validate, then back to
 * prepare while attempts remain and the last one failed.
 */
function buildForgeGraph<T, TSettings>(deps: ForgeGraphDeps<T, TSettings>) {
  const ForgeState = createForgeState<T, TSettings>();
  type State = typeof ForgeState.State;

  // Prepare node - render on the first attempt, append feedback on later ones
  async function prepare(state: State): Promise<Partial<State>> {
    const { outcome, request } = state;
    if (outcome.status === "failed") {
      return { prompt: withFeedback(state.prompt, outcome.error) };
    }

    const prompt = deps.prompt.render({
      ...request.promptValues,
      [USER_INPUT_VARIABLE]: request.userInput,
      [RESPONSE_MODEL_VARIABLE]: deps.responseModel.jsonSchema,
    });
    deps.logger.debug(`[${request.runId}] Rendered prompt:\n${prompt}`);

    return { prompt };
  }

  // Send node - transport errors are not caught and end the run
  async function send(state: State): Promise<Partial<State>> {
    const { runId, modelSettings } = state.request;
    deps.logger.debug(
      `[${runId}] Attempt ${state.attempts + 1} of ${deps.maxRetries}`
    );

    const response = await deps.model.send(state.prompt, modelSettings);
    deps.logger.debug(`[${runId}] Processing model response:\n${response}`);

    return { response, attempts: 1 };
  }

  async function extract(state: State): Promise<Partial<State>> {
    const candidates = findPatterns(state.response, deps.matchPatterns);
    deps.logger.debug(
      `[${state.request.runId}] Found ${candidates.length} candidate(s)`
    );
    return { candidates };
  }

  async function validate(state: State): Promise<Partial<State>> {
    const result = deps.validator.validate(state.candidates);
    if (result.success) {
      return {
        outcome: {
          status: "success",
          value: result.data,
          candidate: result.candidate,
        },
      };
    }

    deps.logger.debug(
      `[${state.request.runId}] Attempt ${state.attempts} failed: ${result.error.message}`
    );
    return { outcome: { status: "failed", error: result.error } };
  }

  function retryOrEnd(state: State): "prepare" | typeof END {
    if (state.outcome.status === "failed" && state.attempts < deps.maxRetries) {
      return "prepare";
    }
    return END;
  }

  return new StateGraph(ForgeState)
    .addNode("prepare", prepare)
    .addNode("send", send)
    .addNode("extract", extract)
    .addNode("validate", validate)
    .addEdge(START, "prepare")
    .addEdge("prepare", "send")
    .addEdge("send", "extract")
    .addEdge("extract", "validate")
    .addConditionalEdges("validate", retryOrEnd, ["prepare", END])
    .compile();
}

type ForgeGraph<T, TSettings> = ReturnType<
  typeof buildForgeGraph<T, TSettings>
>;

/**
 * Derives a typed value from a language model's free-text response.
 *
 * The prompt is rendered once, sent to the model, and every candidate JSON
 * snippet found in the response is validated against the response model until
 * one passes. When none does, the errors are appended to the prompt as feedback
 * and the model is asked again, up to `maxRetries` attempts in total.
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 * import { ChatOpenAI } from "@langchain/openai";
 *
 * const User = z.object({
 *   name: z.string().describe("The person's name"),
 *   age: z.number().int().describe("The person's age"),
 * });
 *
 * const forge = new Forge({
 *   model: new ChatModelClient(new ChatOpenAI({ model: "gpt-4o-mini" })),
 *   responseModel: User,
 * });
 *
 * const user = await forge.generate("Alice turned 30 last week.");
 * // { name: "Alice", age: 30 }
 * ```
 */
export class Forge<T, TSettings = ModelSettings> {
  readonly model: LanguageModel<TSettings>;
  readonly responseModel: ResponseModel<T>;
  readonly prompt: Prompt;
  readonly matchPatterns: MatchPattern | readonly MatchPattern[];
  readonly maxRetries: number;
  readonly raiseOnFailure: boolean;
  private readonly logger: ForgeLogger;
  private readonly graph: ForgeGraph<T, TSettings>;

  constructor(options: ForgeOptions<T, TSettings>) {
    const config = ForgeConfigSchema.parse({
      prompt: options.prompt,
      matchPatterns: options.matchPatterns,
      maxRetries: options.maxRetries,
      raiseOnFailure: options.raiseOnFailure,
    });

    this.model = options.model;
    this.responseModel = new ResponseModel(options.responseModel);
    this.prompt = new Prompt(config.prompt);
    this.matchPatterns = config.matchPatterns ?? DEFAULT_MATCH_PATTERNS;
    this.maxRetries = config.maxRetries;
    this.raiseOnFailure = config.raiseOnFailure;
    this.logger = options.logger || silentLogger;

    this.graph = buildForgeGraph({
      model: this.model,
      prompt: this.prompt,
      responseModel: this.responseModel,
      validator: new CandidateValidator(this.responseModel, {
        formatError: options.formatError,
      }),
      matchPatterns: this.matchPatterns,
      maxRetries: this.maxRetries,
      logger: this.logger,
    });
  }

  /**
   * Generate a value, with the details of how it was derived.
   *
   * @throws ResponseNotDerivedError when every attempt fails and
   * `raiseOnFailure` is set. Errors from the model client and from rendering
   * the prompt are rethrown as they are.
   */
  async run(
    userInput: string,
    options: GenerateOptions<TSettings> = {}
  ): Promise<ForgeOutputs<T>> {
    const runId = uuidv4();
    const state = await this.graph.invoke(
      {
        request: {
          runId,
          userInput,
          promptValues: options.promptValues,
          modelSettings: options.modelSettings,
        },
      },
      { recursionLimit: (this.maxRetries + 1) * STEPS_PER_ATTEMPT }
    );

    const { outcome, attempts } = state;
    if (outcome.status === "success") {
      return {
        value: outcome.value,
        attempts,
        prompt: state.prompt,
        candidate: outcome.candidate,
        runId,
      };
    }
    if (outcome.status === "pending") {
      throw new ForgeError("The retry loop ended without an outcome.");
    }

    const prompt = withFeedback(state.prompt, outcome.error);
    this.logger.warn(
      `[${runId}] Could not derive a response after ${attempts} attempt(s): ${outcome.error.message}`
    );

    if (this.raiseOnFailure) {
      throw new ResponseNotDerivedError(prompt, attempts, {
        cause: outcome.error,
      });
    }

    return { value: null, attempts, prompt, runId };
  }

  /**
   * Generate a value of the response model's type from the user input.
   *
   * @returns The validated value, or null if every attempt failed and
   * `raiseOnFailure` is false.
   */
  async generate(
    userInput: string,
    options: GenerateOptions<TSettings> = {}
  ): Promise<T | null> {
    const { value } = await this.run(userInput, options);
    return value;
  }
}
