/**
 * Unit tests for the console response printer.
 */

import { createResponsePrinter, formatAgentResponse } from "../../../src/console/printer";
import type { ChatMessage } from "../../../src/conversation/types";

const reply: ChatMessage = {
  position: 3,
  name: "FlightSpecialist",
  role: "assistant",
  content: "There is a morning flight.",
  items: [
    { type: "function_call", name: "search_flights", arguments: '{"departure":"OTP"}' },
    { type: "function_result", name: "search_flights", result: "1 flight" },
  ],
};

describe("formatAgentResponse", () => {
  it("prints the reply then each function call and result", () => {
    expect(formatAgentResponse(reply)).toEqual([
      "FlightSpecialist: There is a morning flight.",
      `Calling 'search_flights' with arguments '{"departure":"OTP"}'`,
      "Result from 'search_flights' is '1 flight'",
    ]);
  });

  it("prints a single line without items", () => {
    expect(formatAgentResponse({ position: 0, name: "SupportAgent", role: "assistant", content: "Hi" })).toEqual([
      "SupportAgent: Hi",
    ]);
  });
});

describe("createResponsePrinter", () => {
  it("writes every line", () => {
    const lines: string[] = [];
    createResponsePrinter((line) => lines.push(line))(reply);
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe("FlightSpecialist: There is a morning flight.");
  });
});
