// =============================================================================
// Tests — CLI argument handling and output
// =============================================================================

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { runCli, VERSION } from "../program.js";
import type { CliIO } from "../program.js";
import {
  COMPETITIVE_VERDICT,
  createMockCollaborators,
  createScriptedChat,
  marketResearchScript,
} from "../../__tests__/helpers/test-utils.js";

function io(env: Record<string, string | undefined> = {}, verdict = COMPETITIVE_VERDICT) {
  const out: string[] = [];
  const err: string[] = [];
  const chat = createScriptedChat(marketResearchScript(verdict));
  const cli: CliIO = {
    env,
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    collaborators: () => createMockCollaborators(chat),
  };
  return { cli, out, err };
}

describe("fanweave CLI", () => {
  beforeEach(() => {
    vi.stubEnv("NO_COLOR", "1");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prints the version", async () => {
    const { cli, out } = io();
    expect(await runCli(["--version"], cli)).toBe(0);
    expect(out).toEqual([`fanweave v${VERSION}`]);
  });

  it("prints help without arguments", async () => {
    const { cli, out } = io();
    expect(await runCli([], cli)).toBe(0);
    expect(out[0]).toContain('fanweave "<proposal>"            Run the workflow and print its outputs');
  });

  it("runs the workflow and prints each output", async () => {
    const { cli, out, err } = io();

    expect(await runCli(["Bulk", "steel", "bolts"], cli)).toBe(0);

    expect(out).toHaveLength(2);
    expect(out[0]).toBe("NEGOTIATION STRATEGY:\npush for volume discount");
    expect(out[1]).toMatch(/^Completed in \d+(ms|\.\ds)$/);
    expect(err).toEqual([]);
  });

  it("prints the event stream with --stream", async () => {
    const { cli, out } = io();

    expect(await runCli(["Bulk bolts", "--stream"], cli)).toBe(0);

    expect(out[0]).toMatch(/^▶ run \S+ started at dispatcher$/);
    expect(out).toContain("    dispatcher -[fan-out]-> compliance-expert");
    expect(out).toContain("  → aggregator (batch of 3)");
    expect(out).toContain("    aggregator -[switch]-> negotiator");
    expect(out).toContain("\nNEGOTIATION STRATEGY:\npush for volume discount\n");
    expect(out[out.length - 1]).toMatch(/^■ completed in .+ with 1 output\(s\)$/);
  });

  it("reports a failed run and exits with 1", async () => {
    const { cli, out, err } = io({}, "no verdict here");

    expect(await runCli(["Bulk bolts"], cli)).toBe(1);

    expect(out).toEqual([]);
    expect(err[err.length - 1]).toBe('✗ Executor "aggregator" failed: evaluator verdict contains no JSON object');
    expect(err[0]).toMatch(/\[error\] \[market-research\] run ended /);
  });

  it("reports configuration errors", async () => {
    const { cli, err } = io({ RESEARCH_COLLABORATORS: "ftp" });
    expect(await runCli(["Bulk bolts"], cli)).toBe(1);
    expect(err[0]?.startsWith('✗ Invalid "RESEARCH_COLLABORATORS": ')).toBe(true);
  });

  it("requires an API key for the chat model", async () => {
    const out: string[] = [];
    const err: string[] = [];
    const code = await runCli(["Bulk bolts"], { env: {}, out: (l) => out.push(l), err: (l) => err.push(l) });
    expect(code).toBe(1);
    expect(err).toEqual(['✗ Invalid "OPENAI_API_KEY": required to reach the chat model']);
  });

  it("prints the graph as Mermaid", async () => {
    const { cli, out } = io();
    expect(await runCli(["graph"], cli)).toBe(0);
    const lines = out[0]?.split("\n") ?? [];
    expect(lines[0]).toBe("graph LR");
    expect(lines).toContain("  aggregator -->|case 1| negotiator");
  });
});
