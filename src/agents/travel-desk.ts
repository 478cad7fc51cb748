/**
 * Travel desk rosters: the agents each orchestration runs with.
 * Every factory takes the shared LLM backend and config so tests can pass scripted fakes.
 */

import type { ILLM } from "../adapters/llm";
import type { AppConfig } from "../config";
import type { Tool } from "../tools/types";
import { FlightSearchTool } from "../tools/flight-search";
import type { AgentPrompt } from "../prompts/travel-agents";
import {
  COORDINATOR_GATE,
  ENTERTAINMENT_SPECIALIST,
  FLIGHT_SPECIALIST,
  SPORT_AGENT,
  SPORT_SPECIALIST,
  SUMMARIZER_AGENT,
  SUPPORT_AGENT,
  TRAVEL_AGENT,
  TRAVEL_AGENT_WITH_FLIGHTS,
  TRAVEL_INFO_COORDINATOR,
  TRIAGE_AGENT,
  TRIP_ADVISOR,
  WEATHER_SPECIALIST,
  WELCOME_AGENT,
} from "../prompts/travel-agents";
import type { IAgent, ParticipantRole } from "./types";
import { ChatAgent } from "./chat-agent";
import { WorkflowAgent } from "./workflow-agent";
import { OrchestrationHandoffs } from "../orchestration/handoff";
import type { IntentWorkflow } from "../orchestration/intent-router";
import type { OrchestrationCallbacks } from "../orchestration/types";

export interface RosterDeps {
  llm: ILLM;
  config: AppConfig;
  /** Observe inner workflow steps. */
  callbacks?: OrchestrationCallbacks;
}

function agent(deps: RosterDeps, prompt: AgentPrompt, role: ParticipantRole, tools?: Tool[]): ChatAgent {
  return new ChatAgent({
    name: prompt.name,
    role,
    description: prompt.description,
    instructions: prompt.instructions,
    llm: deps.llm,
    tools,
    maxTokens: deps.config.llm.maxTokens,
    timeoutMs: deps.config.llm.timeoutMs,
  });
}

export function createFlightSearchTool(config: AppConfig): FlightSearchTool {
  return new FlightSearchTool({
    apiKey: config.tools.serpApiKey,
    currency: config.tools.flightSearchCurrency,
    language: config.tools.flightSearchLanguage,
    country: config.tools.flightSearchCountry,
  });
}

/** Support desk plus the three specialists, in speaking order. */
export function createSupportRoster(deps: RosterDeps): IAgent[] {
  return [
    agent(deps, SUPPORT_AGENT, "entry"),
    agent(deps, WEATHER_SPECIALIST, "specialist"),
    agent(deps, SPORT_SPECIALIST, "specialist"),
    agent(deps, FLIGHT_SPECIALIST, "specialist", [createFlightSearchTool(deps.config)]),
  ];
}

/** Specialists only; the plain round robin runs without a greeter. */
export function createSpecialistRoster(deps: RosterDeps): IAgent[] {
  return [
    agent(deps, WEATHER_SPECIALIST, "specialist"),
    agent(deps, SPORT_SPECIALIST, "specialist"),
    agent(deps, FLIGHT_SPECIALIST, "specialist", [createFlightSearchTool(deps.config)]),
  ];
}

/**
 * Travel notes, weather, entertainment, then a one-sentence synopsis.
 * With `gated`, off-topic queries can be transferred away before the pipeline runs.
 */
export function createTravelInfoCoordinator(deps: RosterDeps, gated = false): WorkflowAgent {
  return new WorkflowAgent({
    name: TRAVEL_INFO_COORDINATOR.name,
    description: TRAVEL_INFO_COORDINATOR.description,
    members: [
      agent(deps, TRAVEL_AGENT, "worker"),
      agent(deps, WEATHER_SPECIALIST, "worker"),
      agent(deps, ENTERTAINMENT_SPECIALIST, "worker"),
      agent(deps, SUMMARIZER_AGENT, "worker"),
    ],
    ...(gated ? { gate: agent(deps, COORDINATOR_GATE, "router") } : {}),
    callbacks: deps.callbacks,
  });
}

export interface TriageRoster {
  triage: IAgent;
  fallback: IAgent;
  workflows: Record<string, IntentWorkflow>;
}

/** Each intent runs its own short pipeline of individual agents. */
export function createTriageRoster(deps: RosterDeps): TriageRoster {
  return {
    triage: agent(deps, TRIAGE_AGENT, "router"),
    fallback: agent(deps, WELCOME_AGENT, "entry"),
    workflows: {
      TRAVEL: {
        agents: [agent(deps, TRAVEL_AGENT, "worker"), agent(deps, SUMMARIZER_AGENT, "worker")],
        description: "Travel advice condensed into a one-sentence summary",
      },
      SPORT: { agents: [agent(deps, SPORT_AGENT, "specialist")], description: "Sports facts and trivia" },
      FLIGHT: {
        agents: [agent(deps, FLIGHT_SPECIALIST, "specialist", [createFlightSearchTool(deps.config)])],
        description: "Flight details for the destination",
      },
    },
  };
}

/** TRAVEL runs through the coordinator's inner pipeline instead of individual agents. */
export function createWorkflowTriageRoster(deps: RosterDeps): TriageRoster {
  return {
    triage: agent(deps, TRIAGE_AGENT, "router"),
    fallback: agent(deps, WELCOME_AGENT, "entry"),
    workflows: {
      TRAVEL: { agents: [createTravelInfoCoordinator(deps)], description: TRAVEL_INFO_COORDINATOR.description },
      SPORT: { agents: [agent(deps, SPORT_AGENT, "specialist")], description: "Sports facts and trivia" },
    },
  };
}

export interface HandoffRoster {
  members: IAgent[];
  handoffs: OrchestrationHandoffs;
}

/** SupportAgent and TripAdvisor dispatch; every member can send the user back to SupportAgent. */
export function createHandoffRoster(deps: RosterDeps): HandoffRoster {
  const support = agent(deps, SUPPORT_AGENT, "entry");
  const advisor = agent(deps, TRIP_ADVISOR, "router");
  const coordinator = createTravelInfoCoordinator(deps, true);
  const sport = agent(deps, SPORT_SPECIALIST, "specialist");
  const flight = agent(deps, FLIGHT_SPECIALIST, "specialist", [createFlightSearchTool(deps.config)]);

  const handoffs = new OrchestrationHandoffs().addMany(support.name, {
    [advisor.name]: "Transfer to this agent when the user's intent is unclear or mixes travel and sports.",
    [coordinator.name]: "Transfer to this agent for destination advice, weather and things to do.",
    [sport.name]: "Transfer to this agent for sports questions.",
  });
  handoffs.addMany(advisor.name, {
    [coordinator.name]: "Transfer to this agent for travel information, destinations, tips and budgets.",
    [sport.name]: "Transfer to this agent for sport topics, events and trivia.",
    [flight.name]: "Transfer to this agent for flights to the travel destination.",
  });
  const backToSupport = "Transfer back to the SupportAgent when the request is outside your expertise.";
  for (const member of [advisor, coordinator, sport, flight]) {
    handoffs.add(member.name, support.name, backToSupport);
  }
  return { members: [support, advisor, coordinator, sport, flight], handoffs };
}

/** Travel assistant with flight search, for the single-agent console chat. */
export function createTravelAssistant(deps: RosterDeps): ChatAgent {
  return agent(deps, TRAVEL_AGENT_WITH_FLIGHTS, "specialist", [createFlightSearchTool(deps.config)]);
}
