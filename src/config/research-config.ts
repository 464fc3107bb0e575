// =============================================================================
// Research config — Environment → validated application settings
// =============================================================================

import { z } from "zod";
import { LogLevelSchema } from "../domain/workflow.schema.js";
import type { LogLevel } from "../domain/workflow.schema.js";
import { ConfigError } from "../errors.js";

/** Unset and empty variables are treated alike. */
const blank = (value: unknown): unknown => (value === "" ? undefined : value);

const optionalString = z.preprocess(blank, z.string().optional());
const optionalUrl = z.preprocess(blank, z.string().url().optional());

export const ResearchEnvSchema = z.object({
  RESEARCH_COLLABORATORS: z.preprocess(blank, z.enum(["mock", "http"]).default("mock")),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalUrl,
  OPENAI_MODEL: z.preprocess(blank, z.string().default("gpt-4o-mini")),
  SEARCH_ENDPOINT: optionalUrl,
  SEARCH_API_KEY: optionalString,
  SEARCH_INDEX: z.preprocess(blank, z.string().default("supplier-docs")),
  ANALYTICS_WORKSPACE_ID: optionalString,
  ANALYTICS_ACCESS_TOKEN: optionalString,
  GITHUB_TOKEN: optionalString,
  LOG_LEVEL: z.preprocess(blank, LogLevelSchema.default("warn")),
});

export type CollaboratorMode = "mock" | "http";

export interface ResearchConfig {
  mode: CollaboratorMode;
  logLevel: LogLevel;
  chat: { apiKey?: string; baseURL?: string; model: string };
  /** Present in http mode. */
  search?: { endpoint: string; apiKey: string; index: string };
  /** Present in http mode. */
  analytics?: { workspaceId: string; accessToken: string };
  github: { token?: string };
}

/**
 * Reads settings from `env` (default: `process.env`). Throws {@link ConfigError}
 * naming the first offending variable.
 */
export function loadResearchConfig(env: Record<string, string | undefined> = process.env): ResearchConfig {
  const parsed = ResearchEnvSchema.safeParse(env);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ConfigError(issue?.message ?? "invalid environment", issue?.path.join("."));
  }
  const vars = parsed.data;

  const config: ResearchConfig = {
    mode: vars.RESEARCH_COLLABORATORS,
    logLevel: vars.LOG_LEVEL,
    chat: { apiKey: vars.OPENAI_API_KEY, baseURL: vars.OPENAI_BASE_URL, model: vars.OPENAI_MODEL },
    github: { token: vars.GITHUB_TOKEN },
  };
  if (config.mode === "mock") return config;

  config.search = {
    endpoint: requireVar(vars.SEARCH_ENDPOINT, "SEARCH_ENDPOINT"),
    apiKey: requireVar(vars.SEARCH_API_KEY, "SEARCH_API_KEY"),
    index: vars.SEARCH_INDEX,
  };
  config.analytics = {
    workspaceId: requireVar(vars.ANALYTICS_WORKSPACE_ID, "ANALYTICS_WORKSPACE_ID"),
    accessToken: requireVar(vars.ANALYTICS_ACCESS_TOKEN, "ANALYTICS_ACCESS_TOKEN"),
  };
  return config;
}

function requireVar(value: string | undefined, name: string): string {
  if (value === undefined) {
    throw new ConfigError("required when RESEARCH_COLLABORATORS=http", name);
  }
  return value;
}
