/**
 * WorkflowAgent: a single participant whose reply is produced by an inner
 * sequential pipeline (e.g. travel notes -> weather -> entertainment -> synopsis).
 */

import type { History } from "../conversation/types";
import type { AgentResponse, IAgent, ParticipantRole, RespondOptions } from "./types";
import { SequentialOrchestration } from "../orchestration/sequential";
import type { OrchestrationCallbacks } from "../orchestration/types";
import { logger } from "../logging";

export interface WorkflowAgentConfig {
  name: string;
  role?: ParticipantRole;
  description?: string;
  members: IAgent[];
  /**
   * Consulted first when control tools are offered (handoff runs).
   * A terminal call from it ends the turn without running the pipeline.
   */
  gate?: IAgent;
  /** Observe the inner steps (they are not added to the outer history). */
  callbacks?: OrchestrationCallbacks;
}

export class WorkflowAgent implements IAgent {
  readonly name: string;
  readonly role: ParticipantRole;
  readonly description: string;
  private readonly pipeline: SequentialOrchestration;
  private readonly gate?: IAgent;

  constructor(config: WorkflowAgentConfig) {
    this.name = config.name;
    this.role = config.role ?? "coordinator";
    this.description = config.description ?? "";
    this.pipeline = new SequentialOrchestration({ members: config.members, callbacks: config.callbacks });
    this.gate = config.gate;
  }

  /** Runs the pipeline on the latest user line (falls back to the latest message). */
  async respond(history: History, options: RespondOptions = {}): Promise<AgentResponse> {
    const gate = this.gate;
    if (gate && options.extraTools && options.extraTools.length > 0) {
      const gated = await gate.respond(history, { extraTools: options.extraTools });
      if (gated.terminalCall) {
        return { ...gated, message: { ...gated.message, name: this.name } };
      }
      logger.debug(
        { event: "GATE_PASSED", agent: this.name, gate: gate.name, replyLength: gated.message.content.length },
        "Gate let the query through"
      );
    }
    const input = [...history].reverse().find((m) => m.role === "user") ?? history[history.length - 1];
    const result = await this.pipeline.invoke(input?.content ?? "");
    return { message: { name: this.name, role: "assistant", content: result.finalOutput } };
  }
}
