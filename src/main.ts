#!/usr/bin/env node
/**
 * Entry point: pick a demo by name, load config, run it on the console.
 * Usage: travel-desk <groupchat|roundrobin|triage|workflow|handoff|single>
 */

import { loadConfig, missingLlmEnv } from "./config";
import { createLLM } from "./adapters/llm";
import { ConsoleHumanInput, createInterruptHandler } from "./console/human-input";
import { stdoutWriter } from "./console/printer";
import { DEMOS, findDemo } from "./demos";
import { BackendError, errorMessage } from "./errors";
import { logger, logError } from "./logging";

function usage(): string {
  const lines = ["Usage: travel-desk <demo>", "", "Demos:"];
  for (const d of DEMOS) lines.push(`  ${d.name.padEnd(12)}${d.description}`);
  return lines.join("\n");
}

async function main(): Promise<number> {
  const demo = findDemo(process.argv[2] ?? "");
  if (!demo) {
    process.stderr.write(`${usage()}\n`);
    return 1;
  }

  const config = loadConfig();
  const missing = missingLlmEnv(config);
  if (missing.length > 0) {
    process.stderr.write(`Missing environment for LLM provider '${config.llm.provider}': ${missing.join(", ")}\n`);
    return 1;
  }

  const humanInput = new ConsoleHumanInput({ exitCommands: demo.exitCommands });
  process.on("SIGINT", createInterruptHandler(humanInput, (code) => process.exit(code)));
  logger.info({ event: "DEMO_START", demo: demo.name, provider: config.llm.provider }, "Starting demo");
  try {
    await demo.run({ config, llm: createLLM(config), humanInput, write: stdoutWriter });
  } catch (err) {
    if (!(err instanceof BackendError)) throw err;
    logError(logger, err, { event: "BACKEND_ERROR", agent: err.agent });
    process.stderr.write(`Backend error: ${err.message}\n`);
    return 1;
  } finally {
    humanInput.close();
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    logError(logger, err instanceof Error ? err : new Error(errorMessage(err)));
    process.exit(1);
  });
