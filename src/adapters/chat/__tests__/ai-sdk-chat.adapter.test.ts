import { describe, it, expect } from "vitest";
import { tool } from "ai";
import { MockLanguageModelV2 } from "ai/test";
import { z } from "zod";
import { AiSdkChatAdapter } from "../ai-sdk-chat.adapter.js";
import { CollaboratorError } from "../../../errors.js";

const usage = { inputTokens: 3, outputTokens: 2, totalTokens: 5 };

describe("AiSdkChatAdapter", () => {
  it("returns the model text and passes instructions as the system prompt", async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => ({
        finishReason: "stop",
        usage,
        content: [{ type: "text", text: "hello there" }],
        warnings: [],
      }),
    });
    const adapter = new AiSdkChatAdapter({ model });

    const text = await adapter.complete({
      instructions: "Be brief",
      transcript: [{ role: "user", content: "hi" }],
    });

    expect(text).toBe("hello there");
    expect(model.doGenerateCalls).toHaveLength(1);
    expect(model.doGenerateCalls[0]?.prompt[0]).toEqual({ role: "system", content: "Be brief" });
  });

  it("runs tool calls before answering", async () => {
    const terms: string[] = [];
    let step = 0;
    const model = new MockLanguageModelV2({
      doGenerate: async () => {
        step++;
        if (step === 1) {
          return {
            finishReason: "tool-calls",
            usage,
            content: [
              { type: "tool-call", toolCallId: "call-1", toolName: "lookup", input: JSON.stringify({ term: "bolts" }) },
            ],
            warnings: [],
          };
        }
        return { finishReason: "stop", usage, content: [{ type: "text", text: "found 2 suppliers" }], warnings: [] };
      },
    });
    const adapter = new AiSdkChatAdapter({ model, maxSteps: 3 });

    const text = await adapter.complete({
      instructions: "Research suppliers",
      transcript: [{ role: "user", content: "bolts?" }],
      tools: {
        lookup: tool({
          description: "Look up suppliers",
          inputSchema: z.object({ term: z.string() }),
          execute: async ({ term }) => {
            terms.push(term);
            return "2 suppliers";
          },
        }),
      },
    });

    expect(text).toBe("found 2 suppliers");
    expect(terms).toEqual(["bolts"]);
    expect(model.doGenerateCalls).toHaveLength(2);
  });

  it("wraps model failures in CollaboratorError", async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => {
        throw new Error("model unavailable");
      },
    });
    const adapter = new AiSdkChatAdapter({ model });

    const error = await adapter
      .complete({ instructions: "x", transcript: [{ role: "user", content: "y" }] })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollaboratorError);
    if (!(error instanceof CollaboratorError)) return;
    expect(error.collaborator).toBe("chat");
    expect(error.message.startsWith("[chat] ")).toBe(true);
  });
});
