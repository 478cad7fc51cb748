/**
 * Handoff orchestration: the active agent either transfers control to one of its
 * declared targets, completes the task, or needs the user, all through function calls.
 */

import type { IAgent } from "../agents/types";
import type { History } from "../conversation/types";
import { HUMAN_NAME } from "../conversation/types";
import { ChatHistory } from "../conversation/history";
import type { Tool } from "../tools/types";
import { stringArg } from "../tools/types";
import type { HumanInputSource, OrchestrationCallbacks } from "./types";
import { HumanInputClosedError, errorMessage } from "../errors";
import { logger, logTurn } from "../logging";

const TRANSFER_PREFIX = "transfer_to_";
export const COMPLETE_TASK_TOOL = "complete_task";
const DEFAULT_MAX_TURNS = 20;

/** Declared transfers: source agent -> (target agent -> when to transfer). */
export class OrchestrationHandoffs {
  private readonly routes = new Map<string, Map<string, string>>();

  add(source: string, target: string, description: string): this {
    if (source === target) throw new Error(`Agent ${source} cannot hand off to itself`);
    let targets = this.routes.get(source);
    if (!targets) {
      targets = new Map();
      this.routes.set(source, targets);
    }
    targets.set(target, description);
    return this;
  }

  addMany(source: string, targets: Record<string, string>): this {
    for (const [target, description] of Object.entries(targets)) this.add(source, target, description);
    return this;
  }

  targetsOf(source: string): ReadonlyMap<string, string> {
    return this.routes.get(source) ?? new Map();
  }

  sources(): string[] {
    return [...this.routes.keys()];
  }
}

/** Function names must be [a-zA-Z0-9_-]; agent names are mapped onto that. */
export function transferToolName(target: string): string {
  return `${TRANSFER_PREFIX}${target.replace(/[^A-Za-z0-9_-]/g, "_")}`;
}

export type HandoffTerminationReason = "completed" | "awaiting_user" | "max_turns" | "human_input_closed";

export interface HandoffConfig {
  /** First member receives the task. */
  members: IAgent[];
  handoffs: OrchestrationHandoffs;
  humanInput?: HumanInputSource;
  /** Agent turns before the run is cut off. */
  maxTurns?: number;
  humanName?: string;
  humanPrompt?: string;
  callbacks?: OrchestrationCallbacks;
  onHandoff?: (from: string, to: string) => void;
}

export interface HandoffResult {
  /** Task summary from complete_task, or the last agent reply. */
  finalResponse: string;
  history: History;
  terminationReason: HandoffTerminationReason;
  /** Agent active when the run ended. */
  activeAgent: string;
  turns: number;
}

export class HandoffOrchestration {
  private readonly byName = new Map<string, IAgent>();
  private readonly maxTurns: number;
  private readonly humanName: string;

  constructor(private readonly config: HandoffConfig) {
    if (config.members.length === 0) throw new Error("Handoff orchestration needs at least one member");
    for (const m of config.members) {
      if (this.byName.has(m.name)) throw new Error(`Duplicate member name: ${m.name}`);
      this.byName.set(m.name, m);
    }
    for (const source of config.handoffs.sources()) {
      if (!this.byName.has(source)) throw new Error(`Handoff source is not a member: ${source}`);
      for (const target of config.handoffs.targetsOf(source).keys()) {
        if (!this.byName.has(target)) throw new Error(`Handoff target is not a member: ${target}`);
      }
    }
    this.maxTurns = config.maxTurns ?? DEFAULT_MAX_TURNS;
    this.humanName = config.humanName ?? HUMAN_NAME;
  }

  /** Terminal tools offered to `agent`: one transfer per declared target, plus complete_task. */
  controlTools(agent: IAgent): Tool[] {
    const tools: Tool[] = [];
    for (const [target, description] of this.config.handoffs.targetsOf(agent.name)) {
      tools.push({
        spec: {
          name: transferToolName(target),
          description,
          parameters: { type: "object", properties: {} },
        },
        terminal: true,
        invoke: async () => `Transferred to ${target}.`,
      });
    }
    tools.push({
      spec: {
        name: COMPLETE_TASK_TOOL,
        description: "Complete the task with a summary when the user's request has been fully handled.",
        parameters: {
          type: "object",
          properties: { task_summary: { type: "string", description: "Summary of what was done for the user." } },
          required: ["task_summary"],
        },
      },
      terminal: true,
      invoke: async () => "Task completed.",
    });
    return tools;
  }

  async invoke(task: string): Promise<HandoffResult> {
    const history = new ChatHistory();
    history.appendUser(task, this.humanName);
    let active = this.config.members[0];
    let turns = 0;
    let lastReply = "";

    const end = (terminationReason: HandoffTerminationReason, finalResponse: string): HandoffResult => {
      logger.info({ event: "HANDOFF_TERMINATED", terminationReason, activeAgent: active.name, turns }, "Handoff run ended");
      return { finalResponse, history: history.snapshot(), terminationReason, activeAgent: active.name, turns };
    };

    while (turns < this.maxTurns) {
      turns++;
      logTurn(logger, "start", active.name, turns);
      const response = await active.respond(history.snapshot(), { extraTools: this.controlTools(active) });
      logTurn(logger, "end", active.name, turns);
      if (response.message.content || response.message.items) {
        const message = history.append(response.message);
        this.config.callbacks?.onAgentResponse?.(message);
      }
      if (response.message.content) lastReply = response.message.content;

      const call = response.terminalCall;
      if (call?.name === COMPLETE_TASK_TOOL) {
        return end("completed", stringArg(call.args, "task_summary") ?? lastReply);
      }
      if (call) {
        const target = this.resolveTransfer(active, call.name);
        if (target) {
          logger.info({ event: "HANDOFF", from: active.name, to: target.name }, "Handing off");
          this.config.onHandoff?.(active.name, target.name);
          active = target;
          continue;
        }
      }

      // No control call: the agent is talking to the user.
      if (!this.config.humanInput) return end("awaiting_user", lastReply);
      let line: string;
      try {
        line = await this.config.humanInput.read(this.config.humanPrompt ?? `${this.humanName}: `);
      } catch (err) {
        if (!(err instanceof HumanInputClosedError)) {
          logger.warn({ event: "HUMAN_INPUT_FAILED", err: errorMessage(err) }, "Human input failed");
        }
        return end("human_input_closed", lastReply);
      }
      const human = history.appendUser(line, this.humanName);
      this.config.callbacks?.onHumanMessage?.(human);
    }
    return end("max_turns", lastReply);
  }

  private resolveTransfer(from: IAgent, toolName: string): IAgent | undefined {
    for (const target of this.config.handoffs.targetsOf(from.name).keys()) {
      if (transferToolName(target) === toolName) return this.byName.get(target);
    }
    logger.warn({ event: "HANDOFF_REJECTED", from: from.name, tool: toolName }, "Transfer to undeclared target ignored");
    return undefined;
  }
}
