/**
 * Round-robin group chat.
 *
 * Members speak in fixed cyclic order. After each agent message the injected
 * turn policy decides whether the human speaks before rotation resumes.
 * Two independent caps end the run: total agent turns and turns per agent.
 * Caps are checked after each agent turn before the policy runs, so the human
 * is never asked to speak after the last turn a cap allows.
 *
 *   AWAITING_NEXT_AGENT --policy: human--> AWAITING_HUMAN --one line--> AWAITING_NEXT_AGENT
 *   any state --cap reached / input closed--> TERMINATED
 */

import type { IAgent } from "../agents/types";
import type { ChatMessage, History } from "../conversation/types";
import { HUMAN_NAME } from "../conversation/types";
import { ChatHistory } from "../conversation/history";
import type { TurnPolicy } from "./turn-policy";
import { neverRequestHumanInput } from "./turn-policy";
import type { HumanInputSource, OrchestrationCallbacks } from "./types";
import { HumanInputClosedError, errorMessage } from "../errors";
import { logger, logTurn, logTurnDecision } from "../logging";

export type GroupChatState = "AWAITING_NEXT_AGENT" | "AWAITING_HUMAN" | "TERMINATED";

export type GroupChatTerminationReason =
  | "max_rounds"
  | "max_rounds_per_agent"
  | "human_input_closed"
  | "human_input_unavailable";

export interface GroupChatConfig {
  members: IAgent[];
  turnPolicy?: TurnPolicy;
  humanInput?: HumanInputSource;
  /** Total agent turns. */
  maxRounds?: number;
  /** Turns any single member may take. */
  maxRoundsPerAgent?: number;
  humanName?: string;
  /** Prompt shown when the human is asked to speak. */
  humanPrompt?: string;
  callbacks?: OrchestrationCallbacks;
  onStateChange?: (from: GroupChatState, to: GroupChatState) => void;
}

export interface GroupChatResult {
  /** Last agent message; human lines never count as the final response. */
  finalResponse: ChatMessage | undefined;
  history: History;
  terminationReason: GroupChatTerminationReason;
  /** Agent turns taken. */
  rounds: number;
  turnsByAgent: Record<string, number>;
}

function assertCap(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new Error(`${name} must be a positive integer`);
  }
}

export class RoundRobinGroupChat {
  private readonly members: IAgent[];
  private readonly turnPolicy: TurnPolicy;
  private readonly humanName: string;
  private readonly humanPrompt: string;

  constructor(private readonly config: GroupChatConfig) {
    if (config.members.length === 0) throw new Error("Group chat needs at least one member");
    const names = new Set<string>();
    for (const m of config.members) {
      if (names.has(m.name)) throw new Error(`Duplicate member name: ${m.name}`);
      names.add(m.name);
    }
    assertCap("maxRounds", config.maxRounds);
    assertCap("maxRoundsPerAgent", config.maxRoundsPerAgent);
    if (config.maxRounds === undefined && config.maxRoundsPerAgent === undefined) {
      throw new Error("Group chat needs maxRounds or maxRoundsPerAgent");
    }
    this.members = [...config.members];
    this.turnPolicy = config.turnPolicy ?? neverRequestHumanInput;
    this.humanName = config.humanName ?? HUMAN_NAME;
    this.humanPrompt = config.humanPrompt ?? `${this.humanName}: `;
  }

  /** Run one conversation seeded with `task`. Each call owns its own history and counters. */
  async invoke(task: string): Promise<GroupChatResult> {
    const history = new ChatHistory();
    history.appendUser(task, this.humanName);
    const turnsByAgent: Record<string, number> = {};
    for (const m of this.members) turnsByAgent[m.name] = 0;
    let rounds = 0;
    let nextIndex = 0;
    let state: GroupChatState = "AWAITING_NEXT_AGENT";

    const transition = (to: GroupChatState) => {
      if (to === state) return;
      this.config.onStateChange?.(state, to);
      state = to;
    };
    const terminate = (terminationReason: GroupChatTerminationReason): GroupChatResult => {
      transition("TERMINATED");
      logger.info({ event: "GROUPCHAT_TERMINATED", terminationReason, rounds }, "Group chat ended");
      return { finalResponse: history.lastFromAgent(), history: history.snapshot(), terminationReason, rounds, turnsByAgent };
    };

    for (;;) {
      const agent = this.members[nextIndex];
      nextIndex = (nextIndex + 1) % this.members.length;
      rounds++;
      turnsByAgent[agent.name]++;
      logTurn(logger, "start", agent.name, rounds);
      const response = await agent.respond(history.snapshot());
      const message = history.append(response.message);
      logTurn(logger, "end", agent.name, rounds);
      this.config.callbacks?.onAgentResponse?.(message);

      if (this.config.maxRounds !== undefined && rounds >= this.config.maxRounds) {
        return terminate("max_rounds");
      }
      if (this.config.maxRoundsPerAgent !== undefined && turnsByAgent[agent.name] >= this.config.maxRoundsPerAgent) {
        return terminate("max_rounds_per_agent");
      }

      const decision = this.turnPolicy(history.snapshot());
      logTurnDecision(logger, message.name, decision.requestHumanInput, decision.reason);
      if (!decision.requestHumanInput) continue;

      transition("AWAITING_HUMAN");
      if (!this.config.humanInput) {
        logger.warn({ event: "HUMAN_INPUT_UNAVAILABLE", after: message.name }, "Human input requested but no source configured");
        return terminate("human_input_unavailable");
      }
      let line: string;
      try {
        line = await this.config.humanInput.read(this.humanPrompt);
      } catch (err) {
        if (err instanceof HumanInputClosedError) return terminate("human_input_closed");
        logger.warn({ event: "HUMAN_INPUT_FAILED", err: errorMessage(err) }, "Human input failed");
        return terminate("human_input_unavailable");
      }
      const human = history.appendUser(line, this.humanName);
      this.config.callbacks?.onHumanMessage?.(human);
      transition("AWAITING_NEXT_AGENT");
    }
  }
}
