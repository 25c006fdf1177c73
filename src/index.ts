#!/usr/bin/env node
/**
 * Growth Coach CLI
 *
 * Drives one conversation turn, shows an execution's status or resets a
 * user's session against the configured store.
 */

import chalk from "chalk";
import { createGrowthCoach, type GrowthCoach, type TurnResponse } from "./coach.js";
import { loadConfig, type GrowthCoachConfig } from "./config.js";
import { normalizeError } from "./errors.js";
import { countStates } from "./execution/dispatcher.js";
import { createLogger, setGlobalLogLevel } from "./observability/logger.js";
import type { DispatchRecord } from "./types.js";

const logger = createLogger("main");
const VERSION = "0.1.0";

const HELP = `
Growth Coach v${VERSION}
Conversational growth coaching with safety-bounded automation

Usage:
  growth-coach --chat <userId> <message...>   Send one message and print the reply
  growth-coach --status <executionId>         Show the state of every dispatched task
  growth-coach --reset <userId>               Discard a user's session
  growth-coach --version                      Show version
  growth-coach --help                         Show this help

Environment:
  GROWTH_COACH_CONFIG      Path to growth-coach.json (default: ./growth-coach.json)
  REDIS_URL                Redis store; the local file store is used when unset or unreachable
  GROWTH_COACH_DATA_DIR    Directory of the local file store (default: ./data)
  AUTOMATION_BASE_URL      Automation backend URL
  AUTOMATION_API_TOKEN     Automation backend token
  TAVILY_API_KEY, SERPAPI_API_KEY, APIFY_API_TOKEN   Research providers
  OPENAI_API_KEY           Inference and embeddings
  LOG_LEVEL                debug | info | warn | error | silent
`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes("--version") || args.includes("-v")) {
    console.log(`Growth Coach v${VERSION}`);
    return;
  }

  const command = args[0];
  if (!command || command === "--help" || command === "-h") {
    console.log(HELP);
    return;
  }

  const config = loadConfig();
  setGlobalLogLevel(config.logLevel);

  switch (command) {
    case "--chat": {
      const [userId, ...words] = args.slice(1);
      if (!userId || words.length === 0) {
        fail("Usage: growth-coach --chat <userId> <message...>");
      }
      await withCoach(config, async (coach) => {
        const result = await coach.handleTurn(userId, words.join(" "));
        printTurn(result);
        if (result.executionId && result.stage === "monitoring") {
          console.log(chalk.dim("\nRunning approved tasks. Press Ctrl+C to stop."));
          const records = await coach.waitForExecution(result.executionId);
          printRecords(result.executionId, records);
        }
      });
      return;
    }
    case "--status": {
      const executionId = args[1];
      if (!executionId) {
        fail("Usage: growth-coach --status <executionId>");
      }
      await withCoach(config, async (coach) => {
        printRecords(executionId, await coach.getExecutionStatus(executionId));
      });
      return;
    }
    case "--reset": {
      const userId = args[1];
      if (!userId) {
        fail("Usage: growth-coach --reset <userId>");
      }
      await withCoach(config, async (coach) => {
        await coach.resetSession(userId);
        console.log(chalk.green(`Session for ${userId} reset.`));
      });
      return;
    }
    default:
      fail(`Unknown command: ${command}. Run with --help for usage.`);
  }
}

async function withCoach(config: GrowthCoachConfig, fn: (coach: GrowthCoach) => Promise<void>): Promise<void> {
  const coach = await createGrowthCoach(config);
  const stop = () => {
    coach.close().catch((error: unknown) => {
      logger.error("Shutdown failed", normalizeError(error));
    });
  };
  process.once("SIGINT", stop);
  try {
    await fn(coach);
  } finally {
    process.off("SIGINT", stop);
    await coach.close();
  }
}

function printTurn(result: TurnResponse): void {
  console.log(chalk.dim(`[${result.stage}]`));
  console.log(result.responseText);
  if (result.error) {
    console.log(chalk.red(`${result.error.code}: ${result.error.message}`));
  }
  if (result.executionId) {
    console.log(chalk.cyan(`Execution: ${result.executionId}`));
  }
}

function printRecords(executionId: string, records: DispatchRecord[] | null): void {
  if (!records) {
    console.log(chalk.yellow(`No execution found with id ${executionId}`));
    return;
  }
  const counts = countStates(records);
  console.log(chalk.bold(`Execution ${executionId}`));
  for (const record of records) {
    const color = record.state === "completed"
      ? chalk.green
      : record.state === "failed" ? chalk.red : chalk.yellow;
    const error = record.lastError ? chalk.dim(` (${record.lastError})`) : "";
    console.log(`  ${color(record.state.padEnd(11))} ${record.taskId} ${chalk.dim(record.category)} x${record.attempts}${error}`);
  }
  console.log(
    `${counts.completed} completed, ${counts.failed} failed, ${counts.queued + counts.in_progress} pending`,
  );
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

// ─── Entry Point ───────────────────────────────────────────────

main().catch((err: unknown) => {
  logger.error("Fatal", normalizeError(err));
  process.exit(1);
});
