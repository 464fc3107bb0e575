// =============================================================================
// Collaborator selection — mock or http data adapters, chat model
// =============================================================================

import { AiSdkChatAdapter } from "../../adapters/chat/ai-sdk-chat.adapter.js";
import { GitHubRepositoryAdapter } from "../../adapters/research/github-repository.adapter.js";
import { HttpAnalyticsAdapter } from "../../adapters/research/http-analytics.adapter.js";
import { HttpDocumentSearchAdapter } from "../../adapters/research/http-document-search.adapter.js";
import {
  MockAnalyticsAdapter,
  MockDocumentSearchAdapter,
  MockRepositoryAdapter,
} from "../../adapters/research/mock-research.adapters.js";
import type { ResearchConfig } from "../../config/research-config.js";
import { ConfigError } from "../../errors.js";
import type { ChatPort } from "../../ports/chat.port.js";
import type { ResearchCollaborators } from "./tools.js";

export interface MarketResearchCollaborators extends ResearchCollaborators {
  chat: ChatPort;
}

export function createResearchCollaborators(config: ResearchConfig): ResearchCollaborators {
  if (config.mode === "mock") {
    return {
      search: new MockDocumentSearchAdapter(),
      analytics: new MockAnalyticsAdapter(),
      repositories: new MockRepositoryAdapter(),
    };
  }
  if (!config.search || !config.analytics) {
    throw new ConfigError("http mode needs search and analytics settings", "RESEARCH_COLLABORATORS");
  }
  return {
    search: new HttpDocumentSearchAdapter(config.search),
    analytics: new HttpAnalyticsAdapter(config.analytics),
    repositories: new GitHubRepositoryAdapter({ token: config.github.token }),
  };
}

export function createChat(config: ResearchConfig): ChatPort {
  if (!config.chat.apiKey) {
    throw new ConfigError("required to reach the chat model", "OPENAI_API_KEY");
  }
  return AiSdkChatAdapter.openai({
    apiKey: config.chat.apiKey,
    baseURL: config.chat.baseURL,
    model: config.chat.model,
  });
}

export function createMarketResearchCollaborators(config: ResearchConfig): MarketResearchCollaborators {
  return { ...createResearchCollaborators(config), chat: createChat(config) };
}
