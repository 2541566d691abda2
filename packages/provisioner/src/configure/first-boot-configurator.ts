/**
 * First-Boot Configurator
 *
 * Runs a fixed sequence of setup steps on a ready instance over SSH:
 * 1. Wait for SSH
 * 2. Create the operator user
 * 3. Install packages
 * 4. Deploy dotfiles
 * 5. Mount the persistent volume
 * 6. System tuning (sysctl, timezone)
 *
 * Steps with nothing configured are skipped. The first failing command
 * aborts the sequence.
 */

import fs from "fs-extra";
import {
  sanitizeUsername,
  type IRemoteShell,
  type ReadyInstance,
} from "@ephemera/adapters-common";
import { BaseOperation, type OperationRuntime } from "../base/base-operation";
import type { BootstrapConfig, VolumeConfig } from "../config/launch-config";
import {
  DOTFILES_STAGING_DIR,
  LABEL_PREFIX,
  SSH_READY_ATTEMPTS,
  SSH_READY_DELAY_MS,
  SYSCTL_CONF_PATH,
} from "../constants";
import { RemoteCommandError, shellQuote } from "../remote/ssh-remote-shell";

export type ConfigureStep = "ssh" | "user" | "packages" | "dotfiles" | "volume" | "tuning";

export interface StepOutcome {
  step: ConfigureStep;
  status: "done" | "skipped";
  detail: string;
}

export interface ConfigureResult {
  host: string;
  steps: StepOutcome[];
}

export interface FirstBootConfiguratorOptions extends OperationRuntime {
  bootstrap: BootstrapConfig;
  /** Volume settings; mounting needs a mount point */
  volume?: VolumeConfig;
  /** User the SSH session logs in as */
  loginUser: string;
  sshReadyAttempts?: number;
  sshReadyDelayMs?: number;
}

/** What the configurator needs to know about the instance */
export type ConfigureTarget = Pick<ReadyInstance, "volume">;

const TOTAL_STEPS = 6;

export class FirstBootConfigurator extends BaseOperation {
  private readonly bootstrap: BootstrapConfig;
  private readonly volume?: VolumeConfig;
  private readonly loginUser: string;
  private readonly sshReadyAttempts: number;
  private readonly sshReadyDelayMs: number;

  constructor(
    private readonly shell: IRemoteShell,
    options: FirstBootConfiguratorOptions,
  ) {
    super(options);
    this.bootstrap = options.bootstrap;
    this.volume = options.volume;
    this.loginUser = options.loginUser;
    this.sshReadyAttempts = options.sshReadyAttempts ?? SSH_READY_ATTEMPTS;
    this.sshReadyDelayMs = options.sshReadyDelayMs ?? SSH_READY_DELAY_MS;
  }

  async configure(target: ConfigureTarget = {}, signal?: AbortSignal): Promise<ConfigureResult> {
    const steps: Array<[ConfigureStep, string, () => Promise<StepOutcome>]> = [
      ["ssh", "Waiting for SSH", () => this.waitForSsh(signal)],
      ["user", "Creating operator user", () => this.createUser()],
      ["packages", "Installing packages", () => this.installPackages()],
      ["dotfiles", "Deploying dotfiles", () => this.deployDotfiles()],
      ["volume", "Mounting volume", () => this.mountVolume(target)],
      ["tuning", "Applying system tuning", () => this.applyTuning()],
    ];

    const outcomes: StepOutcome[] = [];
    for (const [index, [step, title, run]] of steps.entries()) {
      this.log(`[${index + 1}/${TOTAL_STEPS}] ${title}...`);
      let outcome: StepOutcome;
      try {
        outcome = await run();
      } catch (error) {
        this.logFields(
          "configure",
          {
            step,
            status: "failed",
            host: this.shell.host,
            error: error instanceof Error ? error.message.split("\n")[0] : String(error),
          },
          "stderr",
        );
        throw error;
      }
      this.logFields("configure", { step, status: outcome.status, detail: outcome.detail });
      outcomes.push(outcome);
    }

    return { host: this.shell.host, steps: outcomes };
  }

  // ── Steps ────────────────────────────────────────────────────────────

  private async waitForSsh(signal?: AbortSignal): Promise<StepOutcome> {
    await this.withRetry(() => this.shell.run("true"), {
      maxAttempts: this.sshReadyAttempts,
      delayMs: this.sshReadyDelayMs,
      backoffMultiplier: 1,
      description: `SSH to ${this.shell.host}`,
      shouldRetry: (error) => error instanceof RemoteCommandError && error.isConnectionFailure,
      signal,
    });
    return { step: "ssh", status: "done", detail: `connected as ${this.loginUser}` };
  }

  private async createUser(): Promise<StepOutcome> {
    if (!this.bootstrap.username) {
      return { step: "user", status: "skipped", detail: "no username configured" };
    }

    const user = sanitizeUsername(this.bootstrap.username);
    const home = `/home/${user}`;
    const sudoers = `/etc/sudoers.d/90-${LABEL_PREFIX}-${user}`;

    await this.shell.run(
      `id -u ${user} >/dev/null 2>&1 || sudo useradd --create-home --shell ${shellQuote(this.bootstrap.shell)} ${user}`,
    );
    await this.shell.run(`sudo install -d -m 700 -o ${user} -g ${user} ${home}/.ssh`);
    await this.shell.run(
      `sudo install -m 600 -o ${user} -g ${user} ~/.ssh/authorized_keys ${home}/.ssh/authorized_keys`,
    );
    await this.shell.run(
      `echo ${shellQuote(`${user} ALL=(ALL) NOPASSWD:ALL`)} | sudo tee ${sudoers} >/dev/null && sudo chmod 440 ${sudoers}`,
    );

    return { step: "user", status: "done", detail: user };
  }

  private async installPackages(): Promise<StepOutcome> {
    const { packages, packageManager } = this.bootstrap;
    if (packages.length === 0) {
      return { step: "packages", status: "skipped", detail: "no packages configured" };
    }

    const list = packages.join(" ");
    if (packageManager === "apt") {
      await this.shell.run("sudo env DEBIAN_FRONTEND=noninteractive apt-get update -q");
      await this.shell.run(`sudo env DEBIAN_FRONTEND=noninteractive apt-get install -y -q ${list}`);
    } else {
      await this.shell.run(`sudo dnf install -y -q ${list}`);
    }

    return { step: "packages", status: "done", detail: `${packages.length} via ${packageManager}` };
  }

  private async deployDotfiles(): Promise<StepOutcome> {
    const { dotfilesDir } = this.bootstrap;
    if (!dotfilesDir) {
      return { step: "dotfiles", status: "skipped", detail: "no dotfiles directory configured" };
    }
    if (!(await fs.pathExists(dotfilesDir))) {
      throw new Error(`Dotfiles directory not found: ${dotfilesDir}`);
    }

    const owner = this.operatorUser();
    const home = `/home/${owner}`;

    await this.shell.run(`rm -rf ${DOTFILES_STAGING_DIR}`);
    await this.shell.copy(dotfilesDir, DOTFILES_STAGING_DIR);
    await this.shell.run(
      `sudo cp -rT ${DOTFILES_STAGING_DIR} ${home} && sudo chown -R ${owner}:${owner} ${home} && rm -rf ${DOTFILES_STAGING_DIR}`,
    );

    return { step: "dotfiles", status: "done", detail: `${dotfilesDir} -> ${home}` };
  }

  private async mountVolume(target: ConfigureTarget): Promise<StepOutcome> {
    if (!target.volume || target.volume.status !== "attached") {
      return { step: "volume", status: "skipped", detail: "no attached volume" };
    }
    if (!this.volume?.mountPoint) {
      return { step: "volume", status: "skipped", detail: "no mount point configured" };
    }

    const { mountPoint, filesystem } = this.volume;
    const device = await this.shell.run(
      `for i in $(seq 1 30); do [ -e ${target.volume.devicePath} ] && break; sleep 2; done; readlink -f ${target.volume.devicePath}`,
    );

    const existing = await this.shell.run(`sudo blkid -o value -s TYPE ${device} || true`);
    if (!existing) {
      await this.shell.run(`sudo mkfs -t ${filesystem} ${device}`);
    }

    const uuid = await this.shell.run(`sudo blkid -o value -s UUID ${device}`);
    const fstabLine = `UUID=${uuid} ${mountPoint} ${existing || filesystem} defaults,nofail 0 2`;

    await this.shell.run(`sudo mkdir -p ${mountPoint}`);
    await this.shell.run(
      `grep -qs ${shellQuote(`UUID=${uuid} `)} /etc/fstab || echo ${shellQuote(fstabLine)} | sudo tee -a /etc/fstab >/dev/null`,
    );
    await this.shell.run(`mountpoint -q ${mountPoint} || sudo mount ${mountPoint}`);

    return {
      step: "volume",
      status: "done",
      detail: `${device} on ${mountPoint}${existing ? "" : ` (formatted ${filesystem})`}`,
    };
  }

  private async applyTuning(): Promise<StepOutcome> {
    const { sysctl, timezone } = this.bootstrap;
    const entries = Object.entries(sysctl);
    if (entries.length === 0 && !timezone) {
      return { step: "tuning", status: "skipped", detail: "no sysctl settings or timezone configured" };
    }

    const applied: string[] = [];
    if (entries.length > 0) {
      const lines = entries.map(([key, value]) => shellQuote(`${key} = ${value}`)).join(" ");
      await this.shell.run(
        `printf '%s\\n' ${lines} | sudo tee ${SYSCTL_CONF_PATH} >/dev/null && sudo sysctl --system >/dev/null`,
      );
      applied.push(`${entries.length} sysctl`);
    }
    if (timezone) {
      await this.shell.run(`sudo timedatectl set-timezone ${timezone}`);
      applied.push(`timezone ${timezone}`);
    }

    return { step: "tuning", status: "done", detail: applied.join(", ") };
  }

  private operatorUser(): string {
    return this.bootstrap.username ? sanitizeUsername(this.bootstrap.username) : this.loginUser;
  }
}
