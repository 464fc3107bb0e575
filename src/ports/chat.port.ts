// =============================================================================
// ChatPort — Contract for the language-model capability used by agents
// =============================================================================

import type { ToolSet } from "ai";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface ChatRequest {
  /** System instructions describing the agent's role. */
  instructions: string;
  /** Conversation so far; the last entry is usually the user's prompt. */
  transcript: ChatMessage[];
  /** Tools the model may call before answering. */
  tools?: ToolSet;
  signal?: AbortSignal;
}

export interface ChatPort {
  /** Resolves with the final assistant text. */
  complete(request: ChatRequest): Promise<string>;
}
