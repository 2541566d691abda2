import chalk from "chalk";
import ora from "ora";
import {
  ConfigError,
  FirstBootConfigurator,
  SshRemoteShell,
  loadLaunchConfig,
  type ConfigureResult,
  type ConfigureTarget,
  type LaunchConfig,
} from "@ephemera/provisioner";
import { createLogRenderer, verbosityFrom, type Verbosity } from "../utils/output";

interface ConfigureCommandOptions {
  config?: string;
  host?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/** True when the config asks for anything beyond a reachable SSH daemon */
export function hasFirstBootWork(config: LaunchConfig): boolean {
  const { username, packages, dotfilesDir, sysctl, timezone } = config.bootstrap;
  return (
    username !== undefined ||
    packages.length > 0 ||
    dotfilesDir !== undefined ||
    Object.keys(sysctl).length > 0 ||
    timezone !== undefined ||
    config.volume?.mountPoint !== undefined
  );
}

export async function runFirstBoot(
  config: LaunchConfig,
  host: string,
  target: ConfigureTarget,
  verbosity: Verbosity,
  signal?: AbortSignal,
): Promise<ConfigureResult> {
  const shell = new SshRemoteShell(host, {
    user: config.ssh.user,
    port: config.ssh.port,
    identityFile: config.ssh.identityFile,
    connectTimeoutSeconds: config.ssh.connectTimeoutSeconds,
  });
  const configurator = new FirstBootConfigurator(shell, {
    bootstrap: config.bootstrap,
    volume: config.volume,
    loginUser: config.ssh.user,
  });

  const spinner = verbosity === "quiet" ? undefined : ora(`Configuring ${host}...`).start();
  configurator.setLogCallback(createLogRenderer(verbosity, spinner));

  try {
    const result = await configurator.configure(target, signal);
    const done = result.steps.filter((s) => s.status === "done").length;
    spinner?.succeed(`Configured ${host} (${done}/${result.steps.length} steps applied)`);
    return result;
  } catch (error) {
    spinner?.fail(`Configuration of ${host} failed`);
    throw error;
  }
}

export async function configure(options: ConfigureCommandOptions): Promise<void> {
  if (!options.host) {
    throw new ConfigError("--host is required");
  }
  const verbosity = verbosityFrom(options);
  const config = await loadLaunchConfig(options.config);

  // A standalone run assumes the configured volume is already attached.
  const target: ConfigureTarget = config.volume
    ? { volume: { volumeId: config.volume.volumeId, devicePath: config.volume.devicePath, status: "attached" } }
    : {};

  const result = await runFirstBoot(config, options.host, target, verbosity);

  if (verbosity !== "quiet") {
    for (const step of result.steps) {
      const mark = step.status === "done" ? chalk.green("✓") : chalk.gray("-");
      console.log(`  ${mark} ${step.step}: ${chalk.gray(step.detail)}`);
    }
  }
}
