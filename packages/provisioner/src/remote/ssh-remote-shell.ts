/**
 * Remote shell over the system ssh/scp clients.
 */

import type { IRemoteShell } from "@ephemera/adapters-common";
import {
  DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USER,
  REMOTE_COMMAND_TIMEOUT_MS,
} from "../constants";
import { runCommand, type CommandRunner } from "../utils/run-command";

/** ssh exits with 255 when the connection itself fails */
export const SSH_CONNECTION_FAILED = 255;

export class RemoteCommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "RemoteCommandError";
  }

  get isConnectionFailure(): boolean {
    return this.exitCode === SSH_CONNECTION_FAILED;
  }
}

export interface SshRemoteShellOptions {
  user?: string;
  port?: number;
  identityFile?: string;
  connectTimeoutSeconds?: number;
  /** Per-command timeout */
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class SshRemoteShell implements IRemoteShell {
  private readonly user: string;
  private readonly port: number;
  private readonly identityFile?: string;
  private readonly connectTimeoutSeconds: number;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(
    public readonly host: string,
    options: SshRemoteShellOptions = {},
  ) {
    this.user = options.user ?? DEFAULT_SSH_USER;
    this.port = options.port ?? DEFAULT_SSH_PORT;
    this.identityFile = options.identityFile;
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS;
    this.timeoutMs = options.timeoutMs ?? REMOTE_COMMAND_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
  }

  get destination(): string {
    return `${this.user}@${this.host}`;
  }

  /**
   * Run a command through the remote login shell and return its trimmed stdout.
   */
  async run(command: string): Promise<string> {
    const result = await this.runner(
      "ssh",
      [...this.commonOptions(), "-p", String(this.port), this.destination, command],
      { timeoutMs: this.timeoutMs },
    );

    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        `Remote command failed on ${this.host} (exit ${result.exitCode}): ${command}\n${result.stderr.trim()}`,
        command,
        result.exitCode,
        result.stderr,
      );
    }
    return result.stdout.trim();
  }

  /** Copy a file or directory to the remote host */
  async copy(localPath: string, remotePath: string): Promise<void> {
    const target = `${this.destination}:${remotePath}`;
    const result = await this.runner(
      "scp",
      [...this.commonOptions(), "-P", String(this.port), "-r", localPath, target],
      { timeoutMs: this.timeoutMs },
    );

    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        `Copy to ${target} failed (exit ${result.exitCode})\n${result.stderr.trim()}`,
        `scp ${localPath} ${target}`,
        result.exitCode,
        result.stderr,
      );
    }
  }

  private commonOptions(): string[] {
    const args = [
      "-o", "BatchMode=yes",
      "-o", "StrictHostKeyChecking=accept-new",
      "-o", `ConnectTimeout=${this.connectTimeoutSeconds}`,
    ];
    if (this.identityFile) {
      args.push("-i", this.identityFile);
    }
    return args;
  }
}

/** Quote a value for a POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
