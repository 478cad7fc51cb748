/**
 * Triage loop: greet, then classify and route each query until the user exits.
 */

import type { RosterDeps, TriageRoster } from "../agents/travel-desk";
import { createTriageRoster, createWorkflowTriageRoster } from "../agents/travel-desk";
import type { LineWriter } from "../console/printer";
import { createResponsePrinter } from "../console/printer";
import { HUMAN_NAME } from "../conversation/types";
import { HumanInputClosedError, errorMessage } from "../errors";
import { IntentRouter, askOnce } from "../orchestration/intent-router";
import type { HumanInputSource } from "../orchestration/types";
import { WELCOME_PROMPT } from "../prompts/travel-agents";
import { logger, logError } from "../logging";
import type { Demo, DemoContext } from "./types";

/** Number of queries routed before the loop ended. */
export async function runTriageLoop(
  roster: TriageRoster,
  humanInput: HumanInputSource,
  write: LineWriter
): Promise<number> {
  const printer = createResponsePrinter(write);
  const router = new IntentRouter({
    ...roster,
    callbacks: { onAgentResponse: printer },
    onStatus: write,
  });

  write(`${roster.fallback.name}: ${await askOnce(roster.fallback, WELCOME_PROMPT)}`);
  let routed = 0;
  for (;;) {
    let query: string;
    try {
      query = await humanInput.read(`${HUMAN_NAME}: `);
    } catch (err) {
      if (!(err instanceof HumanInputClosedError)) logger.warn({ event: "HUMAN_INPUT_FAILED", err: errorMessage(err) }, "Human input failed");
      break;
    }
    if (!query.trim()) continue;
    try {
      const outcome = await router.route(query);
      routed++;
      if (!outcome.handled) write(`${roster.fallback.name}: ${outcome.finalOutput}`);
    } catch (err) {
      const e = err instanceof Error ? err : new Error(errorMessage(err));
      logError(logger, e, { event: "TRIAGE_FAILED" });
      write(`Error: ${e.message}`);
      break;
    }
  }
  return routed;
}

function triageDemo(name: string, description: string, build: (deps: RosterDeps) => TriageRoster): Demo {
  return {
    name,
    description,
    exitCommands: ["exit"],
    async run({ config, llm, humanInput, write }: DemoContext) {
      const printer = createResponsePrinter(write);
      await runTriageLoop(build({ llm, config, callbacks: { onAgentResponse: printer } }), humanInput, write);
    },
  };
}

export const triageDemoIndividual = triageDemo(
  "triage",
  "Intent triage routing each query to a short pipeline of individual agents",
  createTriageRoster
);

export const triageDemoWorkflow = triageDemo(
  "workflow",
  "Intent triage where travel queries run the coordinator's inner pipeline",
  createWorkflowTriageRoster
);
