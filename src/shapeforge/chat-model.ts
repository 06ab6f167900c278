import { HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import type {
  BaseChatModel,
  BaseChatModelCallOptions,
} from "@langchain/core/language_models/chat_models";

import type { LanguageModel } from "./types.js";
import { getMessageText } from "./utils.js";

export interface ChatModelClientOptions {
  /** Sent as a system message ahead of every prompt. */
  systemPrompt?: string;
}

/**
 * Adapts a LangChain chat model to the `LanguageModel` contract, so any
 * provider LangChain supports can back a Forge.
 *
 * Each prompt is sent as a single human message with no history; settings are
 * passed through as the model's call options.
 *
 * @example
 * ```typescript
 * import { ChatOpenAI } from "@langchain/openai";
 *
 * const client = new ChatModelClient(new ChatOpenAI({ model: "gpt-4o-mini" }));
 * const text = await client.send("Name three colours as a JSON array.");
 * ```
 */
export class ChatModelClient implements LanguageModel<BaseChatModelCallOptions> {
  constructor(
    private readonly model: BaseChatModel,
    private readonly options: ChatModelClientOptions = {}
  ) {}

  async send(input: string, settings?: BaseChatModelCallOptions): Promise<string> {
    const messages: BaseMessage[] = [];
    if (this.options.systemPrompt) {
      messages.push(new SystemMessage({ content: this.options.systemPrompt }));
    }
    messages.push(new HumanMessage({ content: input }));

    const response = await this.model.invoke(messages, settings);
    return getMessageText(response);
  }
}
