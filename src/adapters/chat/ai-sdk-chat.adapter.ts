// =============================================================================
// AiSdkChatAdapter — Wraps a Vercel AI SDK LanguageModel into ChatPort
// =============================================================================

import { generateText, stepCountIs } from "ai";
import type { LanguageModel, ModelMessage } from "ai";
import { createOpenAI } from "@ai-sdk/openai";

import { CollaboratorError } from "../../errors.js";
import type { ChatMessage, ChatPort, ChatRequest } from "../../ports/chat.port.js";

export interface AiSdkChatAdapterOptions {
  model: LanguageModel;
  /** Upper bound on model/tool round trips per completion (default: 5) */
  maxSteps?: number;
  temperature?: number;
}

export interface OpenAIChatOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  maxSteps?: number;
}

export class AiSdkChatAdapter implements ChatPort {
  private readonly model: LanguageModel;
  private readonly maxSteps: number;
  private readonly temperature?: number;

  constructor(options: AiSdkChatAdapterOptions) {
    this.model = options.model;
    this.maxSteps = options.maxSteps ?? 5;
    this.temperature = options.temperature;
  }

  /** Chat-completions model from an OpenAI-compatible endpoint. */
  static openai(options: OpenAIChatOptions): AiSdkChatAdapter {
    const provider = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    return new AiSdkChatAdapter({ model: provider.chat(options.model), maxSteps: options.maxSteps });
  }

  async complete(request: ChatRequest): Promise<string> {
    try {
      const result = await generateText({
        model: this.model,
        system: request.instructions,
        messages: request.transcript.map(toModelMessage),
        tools: request.tools,
        stopWhen: stepCountIs(this.maxSteps),
        temperature: this.temperature,
        abortSignal: request.signal,
      });
      return result.text;
    } catch (error) {
      if (error instanceof CollaboratorError) throw error;
      throw new CollaboratorError("chat", error instanceof Error ? error.message : String(error));
    }
  }
}

function toModelMessage(message: ChatMessage): ModelMessage {
  return message.role === "user"
    ? { role: "user", content: message.content }
    : { role: "assistant", content: message.content };
}
