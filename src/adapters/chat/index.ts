export { AiSdkChatAdapter } from "./ai-sdk-chat.adapter.js";
export type { AiSdkChatAdapterOptions, OpenAIChatOptions } from "./ai-sdk-chat.adapter.js";
