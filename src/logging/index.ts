/**
 * Structured logging for agent turns, LLM calls, tool calls and orchestration decisions.
 * Written to stderr so the conversation itself owns stdout.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info; silent under Jest)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL) ?? (isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true, destination: 2 } }),
    });
  } else {
    streams.push({ stream: pino.destination(2) });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log LLM request/response (summary only). */
export function logLlmCall(
  log: pino.Logger,
  agent: string,
  messageCount: number,
  responseLength: number,
  durationMs?: number
): void {
  log.info({ event: "LLM_CALL", agent, messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log an agent turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", agent: string, round?: number): void {
  log.info({ event: "TURN", phase, agent, round }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log a turn-policy decision (never the message content). */
export function logTurnDecision(
  log: pino.Logger,
  lastSpeaker: string | undefined,
  requestHumanInput: boolean,
  reason: string
): void {
  log.debug({ event: "TURN_DECISION", lastSpeaker, requestHumanInput, reason }, "Turn decision");
}

/** Log tool call outcome. */
export function logToolCall(log: pino.Logger, agent: string, tool: string, resultLength: number, durationMs?: number): void {
  log.info({ event: "TOOL_CALL", agent, tool, resultLength, durationMs }, "Tool completed");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
