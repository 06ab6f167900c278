import { Liquid } from "liquidjs";

import type { PromptValues } from "./types.js";

/** Template variable holding the JSON Schema of the response model. */
export const RESPONSE_MODEL_VARIABLE = "response_model_json";
/** Template variable holding the caller's free-form input. */
export const USER_INPUT_VARIABLE = "user_input";

/**
 * Appended to templates that don't place the response schema themselves.
 */
export const RESPONSE_MODEL_TEXT = [
  "Your output MUST be a JSON object that conforms to the JSON Schema below. All",
  "JSON object property names MUST be enclosed in double quotes.",
  "",
  "You MUST take the types of the OUTPUT SCHEMA into account and adjust your",
  "provided text to fit the required types.",
  "",
  "Here is the OUTPUT SCHEMA:",
  `{{ ${RESPONSE_MODEL_VARIABLE} }}`,
].join("\n");

export const DEFAULT_PROMPT = [
  "You are an expert at extracting entities from user provided text, data or",
  "information and always maintain as much semantic meaning as possible.",
  "Make sure to interpret numbers written as text as numbers when required. Make",
  "sure to identify separate entities.",
  "",
  "Analyze the provided input from the user and generate any entities or objects",
  "that match the requested JSON output according to the OUTPUT SCHEMA provided.",
  "",
  RESPONSE_MODEL_TEXT,
  "{% if examples %}",
  "Here are some examples to show what the desired output is:",
  "{{ examples }}",
  "{% endif %}",
  "Input from user:",
].join("\n");

/**
 * A prompt template rendered with Liquid.
 *
 * Rendering is strict: a variable the template references but the caller
 * doesn't supply throws instead of rendering as empty text. Output is never
 * escaped, and block tags consume the indentation before them and the newline
 * after them.
 *
 * When the caller supplies the response schema or user input and the template
 * doesn't reference them, they are added automatically: the schema section is
 * appended to the template, and the user input is appended to the rendered
 * text as a final line.
 */
export class Prompt {
  readonly template: string;
  /** Root variables referenced by `template`. */
  readonly variables: ReadonlySet<string>;

  private readonly engine = new Liquid({
    strictVariables: true,
    lenientIf: true,
    trimTagLeft: true,
    trimTagRight: true,
    greedy: false,
  });

  constructor(template?: string) {
    this.template = template || DEFAULT_PROMPT;
    this.variables = new Set(this.engine.globalVariablesSync(this.template));
  }

  render(values: PromptValues): string {
    let source = this.template;

    if (
      values[RESPONSE_MODEL_VARIABLE] !== undefined &&
      !this.variables.has(RESPONSE_MODEL_VARIABLE)
    ) {
      source += `\n${RESPONSE_MODEL_TEXT}`;
    }

    let rendered: string = this.engine.parseAndRenderSync(source, values);

    const userInput = values[USER_INPUT_VARIABLE];
    if (userInput !== undefined && !this.variables.has(USER_INPUT_VARIABLE)) {
      rendered += `\n${String(userInput)}`;
    }

    return rendered;
  }
}
