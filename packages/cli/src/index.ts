#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { launch } from "./commands/launch";
import { configure } from "./commands/configure";
import { agentAdd, agentEnv, agentStart, agentStatus, agentStop } from "./commands/agent";
import { exitCodeFor } from "./utils/exit-codes";
import { errorMessage } from "./utils/output";

const VERSION = "0.1.0";

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

const program = new Command();

program
  .name("ephemera")
  .description("Launch short-lived cloud instances and wait until they are usable")
  .version(VERSION);

program
  .command("launch")
  .description("Request an instance (or adopt one) and wait until it is ready")
  .option("-c, --config <path>", "Launch configuration file (JSON)")
  .option("-r, --region <region>", "Cloud region")
  .option("--instance-id <id>", "Wait for an existing instance instead of requesting one")
  .option("--volume-id <id>", "Persistent volume to attach once the instance is healthy")
  .option("--device <path>", "Device path for the volume")
  .option("--poll-interval <seconds>", "Seconds between status checks", positiveNumber)
  .option("--timeout <seconds>", "Give up after this many seconds", positiveNumber)
  .option("--max-attempts <n>", "Give up after this many status checks", positiveInt)
  .option("--skip-configure", "Do not run first-boot configuration")
  .option("-y, --yes", "Skip confirmation prompts")
  .option("-v, --verbose", "Show every state transition")
  .option("-q, --quiet", "Only print the result and errors")
  .action(launch);

program
  .command("configure")
  .description("Run first-boot configuration on a running host")
  .requiredOption("-c, --config <path>", "Launch configuration file (JSON)")
  .requiredOption("--host <address>", "Host name or IP address")
  .option("-v, --verbose", "Show every command")
  .option("-q, --quiet", "Only print errors")
  .action(configure);

const agent = program
  .command("agent")
  .description("Manage the SSH credential agent");

agent
  .command("status")
  .description("Show whether an agent is running and which keys it holds")
  .action(agentStatus);

agent
  .command("start")
  .description("Start an agent, or reuse the recorded one")
  .action(agentStart);

agent
  .command("add <key>")
  .description("Load a private key into the agent")
  .option("-t, --lifetime <seconds>", "Remove the key after this many seconds", positiveInt)
  .action(agentAdd);

agent
  .command("stop")
  .description("Kill the recorded agent")
  .action(agentStop);

agent
  .command("env")
  .description('Print shell exports; use with eval "$(ephemera agent env)"')
  .action(agentEnv);

// Commander prints its own usage errors
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      if (error.exitCode === 0) return;
    } else {
      console.error(chalk.red("Error:"), errorMessage(error));
      if (process.env.DEBUG) {
        console.error(error);
      }
    }
    process.exitCode = exitCodeFor(error);
  }
}

void main();
