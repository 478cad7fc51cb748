/**
 * Intent router: a triage agent labels the query, the label picks a workflow,
 * the workflow's agents run in sequence. Unknown labels go to a fallback agent.
 */

import type { IAgent } from "../agents/types";
import type { ChatMessage } from "../conversation/types";
import { ChatHistory } from "../conversation/history";
import { SequentialOrchestration } from "./sequential";
import type { OrchestrationCallbacks } from "./types";
import { logger } from "../logging";

export interface IntentWorkflow {
  agents: IAgent[];
  description: string;
}

export interface IntentRouterConfig {
  triage: IAgent;
  /** Keyed by upper-case label (TRAVEL, SPORT, FLIGHT...). */
  workflows: Record<string, IntentWorkflow>;
  fallback: IAgent;
  /** Instruction given to the fallback agent for unroutable queries. */
  fallbackPrompt?: string;
  callbacks?: OrchestrationCallbacks;
  /** Progress notes ("Starting 'TRAVEL' workflow..."). */
  onStatus?: (line: string) => void;
}

export type RouteOutcome =
  | { handled: true; intent: string; description: string; steps: ChatMessage[]; finalOutput: string }
  | { handled: false; intent: string; finalOutput: string };

export const DEFAULT_FALLBACK_PROMPT = "Explain the user that you cannot handle his request.";

/** Upper-case, trimmed, surrounding quotes/punctuation removed: `"Travel."` -> `TRAVEL`. */
export function normalizeIntent(raw: string): string {
  return raw
    .trim()
    .toUpperCase()
    .replace(/^[^A-Z0-9]+|[^A-Z0-9]+$/g, "");
}

/** One-message conversation from the given text; the reply's content. */
export async function askOnce(agent: IAgent, text: string): Promise<string> {
  const history = new ChatHistory();
  history.appendUser(text);
  const response = await agent.respond(history.snapshot());
  return response.message.content;
}

export class IntentRouter {
  private readonly workflows = new Map<string, { description: string; pipeline: SequentialOrchestration }>();

  constructor(private readonly config: IntentRouterConfig) {
    for (const [label, workflow] of Object.entries(config.workflows)) {
      const key = normalizeIntent(label);
      if (!key) throw new Error(`Invalid workflow label: ${label}`);
      this.workflows.set(key, {
        description: workflow.description,
        pipeline: new SequentialOrchestration({ members: workflow.agents, callbacks: config.callbacks }),
      });
    }
  }

  get intents(): string[] {
    return [...this.workflows.keys()];
  }

  async classify(query: string): Promise<string> {
    this.config.onStatus?.(`Invoking ${this.config.triage.name} to classify request...`);
    const intent = normalizeIntent(await askOnce(this.config.triage, query));
    logger.info({ event: "INTENT_CLASSIFIED", intent }, "Query classified");
    this.config.onStatus?.(`${this.config.triage.name} classified as > ${intent}`);
    return intent;
  }

  async route(query: string): Promise<RouteOutcome> {
    const intent = await this.classify(query);
    const workflow = this.workflows.get(intent);
    if (!workflow) {
      const finalOutput = await askOnce(this.config.fallback, this.config.fallbackPrompt ?? DEFAULT_FALLBACK_PROMPT);
      return { handled: false, intent, finalOutput };
    }
    this.config.onStatus?.(`Starting '${intent}' workflow: ${workflow.description}`);
    const result = await workflow.pipeline.invoke(query);
    return { handled: true, intent, description: workflow.description, steps: result.steps, finalOutput: result.finalOutput };
  }
}
