/**
 * shapeforge - Basic Example
 *
 * Reads OPENAI_API_KEY from the environment or a .env file.
 * Run with: npm run example
 */

import "dotenv/config";
import { z } from "zod";
import { ChatOpenAI } from "@langchain/openai";
import {
  ChatModelClient,
  Forge,
  ResponseNotDerivedError,
} from "../src/shapeforge/index.js";

const User = z.object({
  name: z.string().describe("The person's name"),
  age: z.number().int().describe("The person's age in years"),
  city: z.string().describe("The city where the person lives"),
  country: z.string().describe("The country where the person lives"),
});

async function main() {
  if (!process.env.OPENAI_API_KEY) {
    console.error("Please set OPENAI_API_KEY environment variable");
    process.exit(1);
  }

  const model = new ChatModelClient(
    new ChatOpenAI({ model: "gpt-4o-mini", temperature: 0 })
  );

  // ==================================================
  // Example 1: Structured record
  // ==================================================
  console.log("=== Example 1: Structured record ===\n");

  const userForge = new Forge({ model, responseModel: User });
  const user = await userForge.run(
    "Alice Johnson turned 30 last week. She lives in Lyon, France."
  );

  console.log("Generated user:", JSON.stringify(user.value, null, 2));
  console.log(`Attempts needed: ${user.attempts}\n`);

  // ==================================================
  // Example 2: Plain value with examples in the prompt
  // ==================================================
  console.log("=== Example 2: Plain value ===\n");

  const tagForge = new Forge({
    model,
    responseModel: z.array(z.string()).describe("Lowercase topic tags"),
  });
  const tags = await tagForge.generate(
    "The new release speeds up JSON parsing and fixes two memory leaks.",
    {
      promptValues: {
        examples: 'input: A faster HTTP client\noutput: {"value": ["http", "performance"]}',
      },
    }
  );

  console.log("Generated tags:", tags, "\n");

  // ==================================================
  // Example 3: Custom prompt template
  // ==================================================
  console.log("=== Example 3: Custom prompt template ===\n");

  const yearForge = new Forge({
    model,
    responseModel: z.number().int(),
    prompt: [
      "Answer with the {{ field }} mentioned in the text below.",
      "{{ response_model_json }}",
      "Text: {{ user_input }}",
    ].join("\n"),
    maxRetries: 2,
  });

  try {
    const year = await yearForge.generate(
      "The bridge opened to traffic in 1937 after four years of work.",
      { promptValues: { field: "year" } }
    );
    console.log("Generated year:", year);
  } catch (error) {
    if (error instanceof ResponseNotDerivedError) {
      console.error(`Gave up after ${error.attempts} attempt(s)`);
      console.error("Final prompt:\n", error.prompt);
      return;
    }
    throw error;
  }
}

main().catch(console.error);
