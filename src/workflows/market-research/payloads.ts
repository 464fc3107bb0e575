// =============================================================================
// Market-research payloads — Tagged union carried by envelopes
// =============================================================================

export interface ExpertInsights {
  compliance: string;
  commercial: string;
  procurement: string;
}

export interface PromptPayload {
  kind: "prompt";
  text: string;
}

export interface AgentResponsePayload {
  kind: "agent-response";
  executorId: string;
  text: string;
}

export interface DecisionPayload {
  kind: "decision";
  competitive: boolean;
  reasoning: string;
  insights: ExpertInsights;
}

/** Terminal, user-visible text. */
export interface ResultPayload {
  kind: "result";
  executorId: string;
  text: string;
}

export type ResearchPayload = PromptPayload | AgentResponsePayload | DecisionPayload | ResultPayload;

export type PayloadKind = ResearchPayload["kind"];
export type PayloadOf<K extends PayloadKind> = Extract<ResearchPayload, { kind: K }>;

function isKind<K extends PayloadKind>(payload: ResearchPayload, kind: K): payload is PayloadOf<K> {
  return payload.kind === kind;
}

/** Narrows `payload` to `kind`; any other variant is a handler failure. */
export function expectPayload<K extends PayloadKind>(payload: ResearchPayload, kind: K): PayloadOf<K> {
  if (!isKind(payload, kind)) {
    throw new Error(`expected a "${kind}" payload, received "${payload.kind}"`);
  }
  return payload;
}

export function prompt(text: string): PromptPayload {
  return { kind: "prompt", text };
}

export function formatInsights(insights: ExpertInsights): string {
  return [
    "COMPLIANCE FINDINGS:",
    insights.compliance,
    "",
    "COMMERCIAL ANALYSIS:",
    insights.commercial,
    "",
    "PROCUREMENT ASSESSMENT:",
    insights.procurement,
  ].join("\n");
}

export function formatDecision(decision: DecisionPayload): string {
  return [
    `VERDICT: ${decision.competitive ? "competitive" : "not competitive"}`,
    `REASONING: ${decision.reasoning}`,
    "",
    formatInsights(decision.insights),
  ].join("\n");
}
