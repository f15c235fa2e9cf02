#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   switchboard                      interactive session
 *   switchboard "check my inbox" ... answer each request in turn, then exit
 */

import "dotenv/config";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { createRouter } from "./agents/index.js";
import type { OnStepCallback } from "./agent.js";
import { configuredLogLevel, loadConfig, validateConfig } from "./config.js";
import { InitializationError, errorMessage } from "./errors.js";
import { OpenAIProvider } from "./llm/openai-provider.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createSdkSessionFactory } from "./mcp/sdk-session.js";
import { HELP_TEXT, runBatch, runRepl, type ReplIO } from "./repl.js";
import { truncate } from "./tools/render.js";

const log = createLogger("cli");

const logStep: OnStepCallback = ({ agent, round, toolCalls, toolResults }) => {
  for (const tc of toolCalls) {
    log.debug(`${agent} round ${round} -> ${tc.name}`, { arguments: tc.arguments });
  }
  for (const tr of toolResults) {
    log.debug(`${agent} round ${round} <- ${tr.name}`, {
      result: truncate(tr.result, 100),
      ...(tr.error ? { error: tr.error } : {}),
    });
  }
};

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(configuredLogLevel(config));

  const problems = validateConfig(config);
  if (problems.length > 0) {
    console.error("Configuration problems:");
    for (const problem of problems) console.error(`  - ${problem}`);
    console.error("Set these in the environment or in a .env file (see .env.example).");
    return 1;
  }

  const router = createRouter(config, {
    llm: new OpenAIProvider({
      apiKey: config.llm.apiKey,
      baseURL: config.llm.baseURL,
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
    }),
    connect: createSdkSessionFactory({
      clientName: "switchboard",
      clientVersion: "0.1.0",
      requestTimeoutMs: config.mcp.requestTimeoutMs,
    }),
    onStep: logStep,
  });

  try {
    await router.start();
  } catch (err) {
    console.error(`Could not start: ${errorMessage(err)}`);
    if (err instanceof InitializationError) console.error(err.hint);
    return 1;
  }

  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  const io: ReplIO = {
    read: async (prompt) => {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write: (text) => console.log(text),
  };

  try {
    const requests = process.argv.slice(2);
    if (requests.length > 0) {
      await runBatch(router, requests, io);
    } else {
      console.log(`Using ${config.llm.model} with Gmail and Microsoft To-Do.`);
      console.log(HELP_TEXT);
      await runRepl(router, io);
    }
  } finally {
    rl.close();
    await router.stop();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  },
);
