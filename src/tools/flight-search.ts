/**
 * Flight search tool backed by the SerpApi Google Flights engine.
 * Never throws: any failure comes back as a "No flight data available" result
 * so the calling agent can tell the user instead of ending the conversation.
 */

import type { Tool, ToolArguments } from "./types";
import { stringArg } from "./types";
import type { ToolSpec } from "../adapters/llm";
import { logger } from "../logging";
import { errorMessage } from "../errors";

export const NO_FLIGHT_DATA = "No flight data available";

const DEFAULT_BASE_URL = "https://serpapi.com/search.json";
const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_RESULTS = 5;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export interface FlightSearchConfig {
  apiKey?: string;
  baseUrl?: string;
  currency?: string;
  language?: string;
  /** Google country code (gl), e.g. "ro". */
  country?: string;
  timeoutMs?: number;
  /** Max itineraries in the summary handed to the model. */
  maxResults?: number;
}

export interface FlightLeg {
  from?: string;
  to?: string;
  departs?: string;
  arrives?: string;
  airline?: string;
  flightNumber?: string;
}

export interface FlightOption {
  price?: number;
  totalDurationMin?: number;
  legs: FlightLeg[];
}

function asRecord(v: unknown): Record<string, unknown> | undefined {
  return v !== null && typeof v === "object" && !Array.isArray(v) ? (v as Record<string, unknown>) : undefined;
}

function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function asNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function toLeg(raw: unknown): FlightLeg | undefined {
  const leg = asRecord(raw);
  if (!leg) return undefined;
  const dep = asRecord(leg.departure_airport);
  const arr = asRecord(leg.arrival_airport);
  return {
    from: asString(dep?.id),
    to: asString(arr?.id),
    departs: asString(dep?.time),
    arrives: asString(arr?.time),
    airline: asString(leg.airline),
    flightNumber: asString(leg.flight_number),
  };
}

/** Pull itineraries out of a Google Flights payload: best flights first, then the rest. */
export function summarizeFlights(payload: unknown, maxResults: number = DEFAULT_MAX_RESULTS): FlightOption[] {
  const root = asRecord(payload);
  if (!root) return [];
  const groups = [root.best_flights, root.other_flights];
  const options: FlightOption[] = [];
  for (const group of groups) {
    if (!Array.isArray(group)) continue;
    for (const raw of group) {
      if (options.length >= maxResults) return options;
      const option = asRecord(raw);
      if (!option) continue;
      const legs = Array.isArray(option.flights)
        ? option.flights.map(toLeg).filter((l): l is FlightLeg => l !== undefined)
        : [];
      options.push({
        price: asNumber(option.price),
        totalDurationMin: asNumber(option.total_duration),
        legs,
      });
    }
  }
  return options;
}

export class FlightSearchTool implements Tool {
  readonly spec: ToolSpec = {
    name: "search_flights",
    description: "Searches for flights based on departure, destination, and date.",
    parameters: {
      type: "object",
      properties: {
        departure: { type: "string", description: "The departure airport code or city." },
        destination: { type: "string", description: "The destination airport code or city." },
        date: { type: "string", description: "The date of travel (YYYY-MM-DD)." },
        return_date: { type: "string", description: "Optional return date (YYYY-MM-DD) for a round trip." },
      },
      required: ["departure", "destination", "date"],
    },
  };

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxResults: number;

  constructor(private readonly cfg: FlightSearchConfig = {}) {
    this.baseUrl = cfg.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxResults = cfg.maxResults ?? DEFAULT_MAX_RESULTS;
  }

  async invoke(args: ToolArguments): Promise<string> {
    const departure = stringArg(args, "departure");
    const destination = stringArg(args, "destination");
    const date = stringArg(args, "date");
    const returnDate = stringArg(args, "return_date");
    if (!departure || !destination || !date) {
      return `${NO_FLIGHT_DATA}: departure, destination and date are required.`;
    }
    if (!DATE_RE.test(date) || (returnDate !== undefined && !DATE_RE.test(returnDate))) {
      return `${NO_FLIGHT_DATA}: dates must use YYYY-MM-DD.`;
    }
    if (!this.cfg.apiKey) {
      return `${NO_FLIGHT_DATA}: flight search is not configured.`;
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set("engine", "google_flights");
    url.searchParams.set("departure_id", departure);
    url.searchParams.set("arrival_id", destination);
    url.searchParams.set("outbound_date", date);
    // type 1 = round trip (needs return_date), 2 = one way
    if (returnDate) {
      url.searchParams.set("type", "1");
      url.searchParams.set("return_date", returnDate);
    } else {
      url.searchParams.set("type", "2");
    }
    url.searchParams.set("currency", this.cfg.currency ?? "USD");
    url.searchParams.set("hl", this.cfg.language ?? "en");
    if (this.cfg.country) url.searchParams.set("gl", this.cfg.country);
    url.searchParams.set("api_key", this.cfg.apiKey);

    let payload: unknown;
    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        logger.warn({ event: "FLIGHT_SEARCH_HTTP_ERROR", status: res.status }, "Flight search returned an error status");
        return `${NO_FLIGHT_DATA}: search service responded with HTTP ${res.status}.`;
      }
      payload = await res.json();
    } catch (err) {
      logger.warn({ event: "FLIGHT_SEARCH_FAILED", err: errorMessage(err) }, "Flight search failed");
      return `${NO_FLIGHT_DATA}: search service unreachable.`;
    }

    const apiError = asString(asRecord(payload)?.error);
    if (apiError) {
      logger.warn({ event: "FLIGHT_SEARCH_API_ERROR", apiError }, "Flight search API error");
      return `${NO_FLIGHT_DATA}: ${apiError}`;
    }
    const flights = summarizeFlights(payload, this.maxResults);
    if (flights.length === 0) {
      return `${NO_FLIGHT_DATA}: no flights found from ${departure} to ${destination} on ${date}.`;
    }
    return JSON.stringify({ departure, destination, date, currency: this.cfg.currency ?? "USD", flights });
  }
}
