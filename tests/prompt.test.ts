import { describe, it, expect } from "vitest";
import {
  DEFAULT_PROMPT,
  Prompt,
  RESPONSE_MODEL_TEXT,
} from "../src/shapeforge/prompt.js";

const SCHEMA_SECTION = [
  "Your output MUST be a JSON object that conforms to the JSON Schema below. All",
  "JSON object property names MUST be enclosed in double quotes.",
  "",
  "You MUST take the types of the OUTPUT SCHEMA into account and adjust your",
  "provided text to fit the required types.",
  "",
  "Here is the OUTPUT SCHEMA:",
  '{"test": 1}',
].join("\n");

const DEFAULT_INTRO = [
  "You are an expert at extracting entities from user provided text, data or",
  "information and always maintain as much semantic meaning as possible.",
  "Make sure to interpret numbers written as text as numbers when required. Make",
  "sure to identify separate entities.",
  "",
  "Analyze the provided input from the user and generate any entities or objects",
  "that match the requested JSON output according to the OUTPUT SCHEMA provided.",
  "",
].join("\n");

describe("Prompt", () => {
  describe("constructor", () => {
    it("should use the default prompt when none is given", () => {
      expect(new Prompt().template).toBe(DEFAULT_PROMPT);
    });

    it("should collect the variables referenced by the template", () => {
      const prompt = new Prompt("{{ a }} {% if b %}{{ c.d }}{% endif %}");
      expect([...prompt.variables].sort()).toEqual(["a", "b", "c"]);
    });

    it("should find the default prompt's variables", () => {
      const prompt = new Prompt();
      expect(prompt.variables.has("response_model_json")).toBe(true);
      expect(prompt.variables.has("examples")).toBe(true);
      expect(prompt.variables.has("user_input")).toBe(false);
    });
  });

  describe("render", () => {
    it("should append the user input as a new line", () => {
      const prompt = new Prompt("Hello");
      expect(prompt.render({ user_input: "World!" })).toBe("Hello\nWorld!");
    });

    it("should append the schema section when the template lacks it", () => {
      const prompt = new Prompt("This is a test.");
      const result = prompt.render({ response_model_json: '{"test": 1}' });
      expect(result).toBe(`This is a test.\n${SCHEMA_SECTION}`);
    });

    it("should append the schema section before the user input", () => {
      const prompt = new Prompt("This is a test.");
      const result = prompt.render({
        response_model_json: '{"test": 1}',
        user_input: "Hi there",
      });
      expect(result).toBe(`This is a test.\n${SCHEMA_SECTION}\nHi there`);
    });

    it("should render the same output every time", () => {
      const prompt = new Prompt("This is a test.");
      const values = { response_model_json: '{"test": 1}', user_input: "Hi" };
      expect(prompt.render(values)).toBe(prompt.render(values));
    });

    it("should not append variables the template already references", () => {
      const prompt = new Prompt(
        "Schema: {{ response_model_json }}\nText: {{ user_input }}"
      );
      const result = prompt.render({
        response_model_json: '{"test": 1}',
        user_input: "Hi",
      });
      expect(result).toBe('Schema: {"test": 1}\nText: Hi');
    });

    it("should not escape values", () => {
      const prompt = new Prompt("Text: {{ text }}");
      expect(prompt.render({ text: "<b>Tom & Jerry</b>" })).toBe(
        "Text: <b>Tom & Jerry</b>"
      );
    });

    it("should not treat the user input as template text", () => {
      const prompt = new Prompt("Hi");
      expect(prompt.render({ user_input: "{{ nope }}" })).toBe("Hi\n{{ nope }}");
    });

    it("should throw on a variable that was not supplied", () => {
      const prompt = new Prompt("Hello {{ name }}");
      expect(() => prompt.render({})).toThrow(/name/);
    });

    it("should not add appended sections to the template variables", () => {
      const prompt = new Prompt("This is a test.");
      prompt.render({ response_model_json: '{"test": 1}', user_input: "Hi" });
      expect(prompt.variables.size).toBe(0);
      expect(prompt.template).toBe("This is a test.");
    });

    it("should render the default prompt without examples", () => {
      const prompt = new Prompt();
      const result = prompt.render({ response_model_json: '{"test": 1}' });
      expect(result).toBe(`${DEFAULT_INTRO}\n${SCHEMA_SECTION}\nInput from user:`);
    });

    it("should render the examples section of the default prompt", () => {
      const prompt = new Prompt();
      const result = prompt.render({
        response_model_json: '{"test": 1}',
        examples: "input: one\noutput: 1",
        user_input: "two",
      });
      expect(result).toBe(
        `${DEFAULT_INTRO}\n${SCHEMA_SECTION}\n` +
          "Here are some examples to show what the desired output is:\n" +
          "input: one\noutput: 1\n" +
          "Input from user:\ntwo"
      );
    });

    it("should render the appended section from the shared schema text", () => {
      const prompt = new Prompt("Intro");
      expect(prompt.render({ response_model_json: '{"test": 1}' })).toBe(
        `Intro\n${RESPONSE_MODEL_TEXT.replace("{{ response_model_json }}", '{"test": 1}')}`
      );
    });
  });
});
