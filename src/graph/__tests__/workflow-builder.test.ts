// =============================================================================
// Tests — WorkflowBuilder validation
// =============================================================================

import { describe, it, expect } from "vitest";
import { Workflow } from "../workflow.js";
import type { WorkflowBuilder } from "../workflow.js";
import { TopologyError } from "../../errors.js";
import { SilentLoggingAdapter } from "../../adapters/logging/console-logging.adapter.js";

// =============================================================================
// Helpers
// =============================================================================

const forward = { handle: () => {} };
const collect = { handleBatch: () => {} };

function builder(): WorkflowBuilder<string, string> {
  return Workflow.create<string, string>({ name: "validation" }).withLogger(new SilentLoggingAdapter());
}

function fanInGraph(): WorkflowBuilder<string, string> {
  return builder()
    .addExecutor("a", forward)
    .addExecutor("b", forward)
    .addExecutor("c", forward)
    .addExecutor("j", collect)
    .setStart("a")
    .addFanOut("a", ["b", "c"])
    .addFanIn(["b", "c"], "j");
}

// =============================================================================
// Tests
// =============================================================================

describe("WorkflowBuilder", () => {
  it("builds a valid graph", () => {
    const workflow = fanInGraph().build();
    expect(workflow.name).toBe("validation");
    expect(workflow.topology.startId).toBe("a");
    expect(workflow.topology.executorIds).toEqual(["a", "b", "c", "j"]);
    expect(workflow.topology.joinInto("j")?.from).toEqual(["b", "c"]);
    expect(workflow.config.maxConcurrency).toBe(8);
  });

  it("rejects an executor registered twice", () => {
    const b = builder().addExecutor("a", forward).addExecutor("a", forward).setStart("a");
    expect(() => b.build()).toThrow(TopologyError);
    expect(() => b.build()).toThrow('executor "a": registered more than once');
  });

  it("requires a registered start executor", () => {
    expect(() => builder().addExecutor("a", forward).build()).toThrow("start: no start executor set");
    expect(() => builder().addExecutor("a", forward).setStart("x").build()).toThrow(
      'start "x": is not a registered executor',
    );
  });

  it("rejects edges to unregistered executors", () => {
    const b = builder().addExecutor("a", forward).setStart("a").addEdge("a", "ghost");
    expect(() => b.build()).toThrow('edge a -> ghost: references unregistered executor "ghost"');
  });

  it("rejects an empty fan-out", () => {
    const b = builder().addExecutor("a", forward).setStart("a").addFanOut("a", []);
    expect(() => b.build()).toThrow("fan-out a -> []: fan-out needs at least one target");
  });

  it("rejects an empty fan-in", () => {
    const b = builder().addExecutor("a", forward).addExecutor("j", collect).setStart("a").addFanIn([], "j");
    expect(() => b.build()).toThrow("fan-in [] -> j: fan-in needs at least one predecessor");
  });

  it("registers nothing when build fails", () => {
    const b = builder().addExecutor("a", forward).setStart("a").addEdge("a", "ghost");
    expect(() => b.build()).toThrow('edge a -> ghost: references unregistered executor "ghost"');
    expect(() => b.build()).toThrow('edge a -> ghost: references unregistered executor "ghost"');

    const workflow = b.addExecutor("ghost", forward).build();
    expect(workflow.topology.executorIds).toEqual(["a", "ghost"]);
    expect(workflow.topology.edges).toEqual([{ kind: "direct", from: "a", to: "ghost" }]);
  });

  it("rejects a fan-in listing a predecessor twice", () => {
    const b = builder()
      .addExecutor("a", forward)
      .addExecutor("b", forward)
      .addExecutor("j", collect)
      .setStart("a")
      .addEdge("a", "b")
      .addFanIn(["b", "b"], "j");
    expect(() => b.build()).toThrow("fan-in [b, b] -> j: lists the same executor more than once");
  });

  it("rejects a duplicated route", () => {
    const b = builder()
      .addExecutor("a", forward)
      .addExecutor("b", forward)
      .setStart("a")
      .addEdge("a", "b")
      .addEdge("a", "b");
    expect(() => b.build()).toThrow('edge a -> b: duplicates the route "a" -> "b"');
  });

  it("allows one fan-in per target", () => {
    const b = builder()
      .addExecutor("a", forward)
      .addExecutor("b", forward)
      .addExecutor("c", forward)
      .addExecutor("d", forward)
      .addExecutor("j", collect)
      .setStart("a")
      .addFanOut("a", ["b", "c", "d"])
      .addFanIn(["b", "c"], "j")
      .addFanIn(["d"], "j");
    expect(() => b.build()).toThrow('fan-in [d] -> j: "j" already has a fan-in');
  });

  it("keeps other edges away from a fan-in target", () => {
    const b = fanInGraph().addEdge("a", "j");
    expect(() => b.build()).toThrow(
      'edge a -> j: "j" is a fan-in target and only accepts deliveries through its join',
    );
  });

  it("rejects the start executor as a fan-in target", () => {
    const b = builder()
      .addExecutor("a", { ...forward, ...collect })
      .addExecutor("b", forward)
      .setStart("a")
      .addFanIn(["b"], "a");
    expect(() => b.build()).toThrow('fan-in [b] -> a: start executor "a" cannot be a fan-in target');
  });

  it("requires handleBatch on fan-in targets", () => {
    const b = builder()
      .addExecutor("a", forward)
      .addExecutor("b", forward)
      .addExecutor("j", forward)
      .setStart("a")
      .addEdge("a", "b")
      .addFanIn(["b"], "j");
    expect(() => b.build()).toThrow('fan-in [b] -> j: "j" must implement handleBatch');
  });

  it("requires handle on executors receiving single envelopes", () => {
    const b = builder().addExecutor("a", forward).addExecutor("b", collect).setStart("a").addEdge("a", "b");
    expect(() => b.build()).toThrow('executor "b": receives single envelopes but does not implement handle');
  });

  it("rejects cycles reachable from the start executor", () => {
    const b = builder()
      .addExecutor("a", forward)
      .addExecutor("b", forward)
      .setStart("a")
      .addEdge("a", "b")
      .addEdge("b", "a");
    expect(() => b.build()).toThrow("cycle a -> b -> a: graph must be acyclic from the start executor");
  });

  it("validates switch targets", () => {
    const b = builder()
      .addExecutor("a", forward)
      .addExecutor("yes", forward)
      .setStart("a")
      .addSwitch("a", [{ when: (p) => p === "y", to: "yes" }], "no");
    expect(() => b.build()).toThrow('switch a -> [yes | default no]: references unregistered executor "no"');
  });
});
