import chalk from "chalk";
import { CredentialAgentManager } from "@ephemera/provisioner";
import { createLogRenderer } from "../utils/output";

function createManager(): CredentialAgentManager {
  const manager = new CredentialAgentManager();
  manager.setLogCallback(createLogRenderer("normal"));
  return manager;
}

export async function agentStatus(): Promise<void> {
  const report = await createManager().status();

  switch (report.status) {
    case "running-with-keys":
      console.log(chalk.green(`✓ Agent running with ${report.keys.length} key(s)`));
      for (const key of report.keys) {
        console.log(chalk.gray(`  ${key}`));
      }
      break;
    case "running-empty":
      console.log(chalk.yellow("⚠ Agent running with no keys loaded"));
      console.log(chalk.gray("  Add one with: ") + chalk.cyan("ephemera agent add <key>"));
      break;
    default:
      console.log(chalk.red("✗ No agent running"));
      console.log(chalk.gray("  Start one with: ") + chalk.cyan("ephemera agent start"));
  }
  if (report.environment) {
    console.log(chalk.gray(`  Socket: ${report.environment.authSock}`));
  }
}

export async function agentStart(): Promise<void> {
  const manager = createManager();
  const { environment, reused } = await manager.start();

  console.log(
    chalk.green(reused ? "✓ Reusing running agent" : "✓ Started agent") +
      chalk.gray(environment.agentPid !== undefined ? ` (pid ${environment.agentPid})` : ""),
  );
  console.log(chalk.gray("  Load it into your shell: ") + chalk.cyan('eval "$(ephemera agent env)"'));
}

export async function agentAdd(keyPath: string, options: { lifetime?: number }): Promise<void> {
  await createManager().addKey(keyPath, options.lifetime);
  const lifetime = options.lifetime !== undefined ? ` for ${options.lifetime}s` : "";
  console.log(chalk.green(`✓ Added ${keyPath}${lifetime}`));
}

export async function agentStop(): Promise<void> {
  const stopped = await createManager().stop();
  console.log(stopped ? chalk.green("✓ Agent stopped") : chalk.yellow("No recorded agent to stop"));
}

/** Raw output for `eval` */
export async function agentEnv(): Promise<void> {
  process.stdout.write(await createManager().env());
}
