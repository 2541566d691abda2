import inquirer from "inquirer";
import chalk from "chalk";
import ora from "ora";
import { EC2Service } from "@ephemera/adapters-aws";
import type { ReadyInstance } from "@ephemera/adapters-common";
import {
  InstanceLauncher,
  ReadinessPoller,
  loadLaunchConfig,
  toInstanceRequest,
  toVolumeAttachment,
  toWaitPolicy,
  describeWaitPolicy,
  type LaunchConfig,
} from "@ephemera/provisioner";
import { createLogRenderer, spinnerProgress, verbosityFrom, type Verbosity } from "../utils/output";
import { hasFirstBootWork, runFirstBoot } from "./configure";

interface LaunchCommandOptions {
  config?: string;
  region?: string;
  instanceId?: string;
  volumeId?: string;
  device?: string;
  pollInterval?: number;
  timeout?: number;
  maxAttempts?: number;
  skipConfigure?: boolean;
  yes?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export async function launch(options: LaunchCommandOptions): Promise<void> {
  const verbosity = verbosityFrom(options);
  const config = await loadLaunchConfig(options.config, {
    region: options.region,
    instanceId: options.instanceId,
    volumeId: options.volumeId,
    devicePath: options.device,
    pollIntervalSeconds: options.pollInterval,
    timeoutSeconds: options.timeout,
    maxAttempts: options.maxAttempts,
  });
  const request = toInstanceRequest(config);
  const waitPolicy = toWaitPolicy(config);

  // Requesting capacity costs money; adopting an existing instance does not.
  if (request.kind === "launch-template" && !options.yes) {
    console.log(chalk.white("Launch summary:"));
    console.log(chalk.gray(`  Region: ${config.region}`));
    console.log(
      chalk.gray(`  Launch template: ${request.launchTemplate.id ?? request.launchTemplate.name}`),
    );
    console.log(chalk.gray(`  Instance type: ${request.overrides.instanceType ?? "(template default)"}`));
    console.log(chalk.gray(`  Capacity: ${request.capacityType}`));
    console.log(chalk.gray(`  Wait: ${describeWaitPolicy(waitPolicy)}`));
    console.log();

    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: "confirm",
        name: "confirm",
        message: chalk.yellow("This will start a billable instance. Continue?"),
        default: false,
      },
    ]);

    if (!confirm) {
      console.log(chalk.yellow("\nLaunch cancelled."));
      return;
    }
  }

  const ec2 = new EC2Service(config.region, config.credentials);
  const poller = new ReadinessPoller({
    statusService: ec2,
    waitPolicy,
    volume: toVolumeAttachment(config),
    volumeService: ec2,
  });
  const launcher = new InstanceLauncher({ fleetService: ec2, poller });

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  const spinner = verbosity === "quiet" ? undefined : ora("Launching...").start();
  launcher.setLogCallback(createLogRenderer(verbosity, spinner));

  try {
    const ready = await launcher.launch(request, {
      signal: controller.signal,
      onProgress: spinner ? spinnerProgress(spinner) : undefined,
    });
    printReady(ready, config, verbosity);

    if (options.skipConfigure || !hasFirstBootWork(config)) {
      return;
    }

    const host = ready.publicAddress ?? ready.privateAddress;
    if (!host) {
      console.error(chalk.yellow(`⚠ ${ready.instanceId} has no reachable address; skipping configuration`));
      return;
    }
    await runFirstBoot(config, host, ready, verbosity, controller.signal);
  } finally {
    process.removeListener("SIGINT", onSigint);
    if (spinner?.isSpinning) spinner.stop();
  }
}

function printReady(ready: ReadyInstance, config: LaunchConfig, verbosity: Verbosity): void {
  const address = ready.publicAddress ?? ready.privateAddress;

  if (verbosity === "quiet") {
    console.log(`${ready.instanceId}${address ? ` ${address}` : ""}`);
    return;
  }

  console.log();
  console.log(chalk.green.bold(`✓ Instance ${ready.instanceId} is ready`));
  console.log(chalk.gray(`  Type: ${ready.instanceType}`));
  if (ready.publicAddress) console.log(chalk.gray(`  Public address: ${ready.publicAddress}`));
  if (ready.privateAddress) console.log(chalk.gray(`  Private address: ${ready.privateAddress}`));
  if (ready.volume) {
    const volume =
      ready.volume.status === "attached"
        ? chalk.green(`${ready.volume.volumeId} attached at ${ready.volume.devicePath}`)
        : chalk.yellow(`${ready.volume.volumeId} skipped (${ready.volume.reason ?? "unknown reason"})`);
    console.log(chalk.gray("  Volume: ") + volume);
  }
  if (address) {
    const identity = config.ssh.identityFile ? `-i ${config.ssh.identityFile} ` : "";
    const port = config.ssh.port === 22 ? "" : `-p ${config.ssh.port} `;
    console.log(chalk.gray("  Connect: ") + chalk.cyan(`ssh ${identity}${port}${config.ssh.user}@${address}`));
  }
  console.log();
}
