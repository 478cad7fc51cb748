/**
 * Turn-taking policy: after each agent message, should the human speak next?
 * Keyed only on who spoke last (by role tag), never on what was said.
 */

import type { History } from "../conversation/types";
import type { Participant, ParticipantRole } from "../agents/types";

export interface TurnDecision {
  requestHumanInput: boolean;
  reason: string;
}

/** Pure: same history in, same decision out. No I/O. */
export type TurnPolicy = (history: History) => TurnDecision;

export const TURN_REASONS = {
  empty: "no participant has spoken yet",
  afterGreeting: "user should respond after the greeting",
  afterSpecialist: "user should respond after a specialist's answer",
  unrecognized: "last speaker not recognized; continue rotation",
} as const;

/** Index a roster by name; names must be unique. */
export function indexRoster(roster: readonly Participant[]): ReadonlyMap<string, ParticipantRole> {
  const roles = new Map<string, ParticipantRole>();
  for (const p of roster) {
    if (roles.has(p.name)) throw new Error(`Duplicate participant name: ${p.name}`);
    roles.set(p.name, p.role);
  }
  return roles;
}

/**
 * Human-in-the-loop policy: the user answers after the entry participant's greeting
 * and after every specialist reply. Anyone else (including the human) keeps the rotation going.
 */
export function createInterjectionPolicy(roster: readonly Participant[]): TurnPolicy {
  const roles = indexRoster(roster);
  return (history) => {
    const last = history[history.length - 1];
    if (!last) return { requestHumanInput: false, reason: TURN_REASONS.empty };
    const role = roles.get(last.name);
    if (role === "entry") return { requestHumanInput: true, reason: TURN_REASONS.afterGreeting };
    if (role === "specialist") return { requestHumanInput: true, reason: TURN_REASONS.afterSpecialist };
    return { requestHumanInput: false, reason: TURN_REASONS.unrecognized };
  };
}

/** Fully automatic rotation. */
export const neverRequestHumanInput: TurnPolicy = () => ({
  requestHumanInput: false,
  reason: "automatic rotation",
});
