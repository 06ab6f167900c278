import type { BaseMessage } from "@langchain/core/messages";

import type { AttemptError } from "./errors.js";
import type { ForgeLogger } from "./types.js";

/**
 * Logger used when none is configured.
 */
export const silentLogger: ForgeLogger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Get the text of a chat message, joining the text parts of multi-part content.
 */
export function getMessageText(message: BaseMessage): string {
  const { content } = message;
  if (typeof content === "string") {
    return content;
  }

  return content
    .map((part) =>
      "text" in part && typeof part.text === "string"
        ? part.text
        : ""
    )
    .join("");
}

/**
 * Append retry feedback for a failed attempt to a prompt.
 */
export function withFeedback(prompt: string, error: AttemptError): string {
  return `${prompt}\nTry again and fix the errors that occurred: ${error.message}`;
}
