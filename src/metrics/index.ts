/**
 * Per-turn metrics for agent replies. Logged; the last value is kept for inspection.
 */

import { logger } from "../logging";

export interface TurnMetrics {
  agent: string;
  /** Sum of backend call latencies within the turn. */
  llmLatencyMs?: number;
  /** Backend calls made (more than one when tools were used). */
  llmCalls?: number;
  toolCalls?: number;
  responseLength?: number;
}

let lastTurnMetrics: TurnMetrics | undefined;

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      agent: metrics.agent,
      llm_latency_ms: metrics.llmLatencyMs,
      llm_calls: metrics.llmCalls,
      tool_calls: metrics.toolCalls,
      response_length: metrics.responseLength,
    },
    "Turn latency"
  );
}

export function getLastTurnMetrics(): TurnMetrics | undefined {
  return lastTurnMetrics;
}
