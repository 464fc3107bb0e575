// =============================================================================
// toMermaid — Renders a workflow topology as Mermaid flowchart syntax
// =============================================================================

import type { WorkflowTopology } from "./topology.js";

const sanitize = (id: string): string => id.replace(/[^A-Za-z0-9_]/g, "_");

/**
 * The start executor is drawn as a stadium, the others as boxes. Fan-out and
 * switch edges are labelled; fan-in edges use thick arrows.
 */
export function toMermaid<P, O>(workflow: { readonly topology: WorkflowTopology<P, O> }): string {
  const { topology } = workflow;
  const lines: string[] = ["graph LR"];

  for (const id of topology.executorIds) {
    const sid = sanitize(id);
    lines.push(id === topology.startId ? `  ${sid}(["${id}"])` : `  ${sid}["${id}"]`);
  }

  for (const edge of topology.edges) {
    switch (edge.kind) {
      case "direct":
        lines.push(`  ${sanitize(edge.from)} --> ${sanitize(edge.to)}`);
        break;
      case "fan-out":
        for (const to of edge.to) {
          lines.push(`  ${sanitize(edge.from)} -->|fan-out| ${sanitize(to)}`);
        }
        break;
      case "fan-in":
        for (const from of edge.from) {
          lines.push(`  ${sanitize(from)} ==>|fan-in| ${sanitize(edge.to)}`);
        }
        break;
      case "switch":
        edge.router.cases.forEach((c, i) => {
          lines.push(`  ${sanitize(edge.from)} -->|case ${i + 1}| ${sanitize(c.to)}`);
        });
        lines.push(`  ${sanitize(edge.from)} -.->|default| ${sanitize(edge.router.defaultTarget)}`);
        break;
    }
  }

  return lines.join("\n");
}
