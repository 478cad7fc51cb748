import type { Demo } from "./types";
import { groupChatDemo } from "./group-chat";
import { roundRobinDemo } from "./round-robin";
import { triageDemoIndividual, triageDemoWorkflow } from "./triage";
import { handoffDemo } from "./handoff";
import { singleAgentDemo } from "./single-agent";

export type { Demo, DemoContext } from "./types";
export { runTriageLoop } from "./triage";

export const DEMOS: readonly Demo[] = [
  groupChatDemo,
  roundRobinDemo,
  triageDemoIndividual,
  triageDemoWorkflow,
  handoffDemo,
  singleAgentDemo,
];

export function findDemo(name: string): Demo | undefined {
  return DEMOS.find((d) => d.name === name.trim().toLowerCase());
}
