/**
 * OpenAI chat completion service for assistant replies
 */

import OpenAI from "openai";
import {
  TextGenerator,
  UpstreamCallOptions,
} from "../providers/ProviderAdapter.js";
import { ChatMessage } from "../storage/ConversationHistory.js";

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;

export interface ResponderConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

function toMessageParam(message: ChatMessage): MessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAIResponder implements TextGenerator {
  private client: OpenAI;
  private config: ResponderConfig;

  constructor(config: ResponderConfig) {
    this.config = config;
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async generate(
    history: readonly ChatMessage[],
    options: UpstreamCallOptions = {},
  ): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: history.map(toMessageParam),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: options.signal },
      );

      const text = completion.choices[0]?.message.content?.trim() ?? "";
      console.log(`[LLM] Generated response: ${text.slice(0, 100)}...`);
      return text;
    } catch (error) {
      console.error(`[LLM] Error generating response:`, error);
      throw error;
    }
  }
}
