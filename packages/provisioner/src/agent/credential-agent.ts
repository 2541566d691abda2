/**
 * Credential Agent Manager
 *
 * Keeps one ssh-agent for the operator across shells. The agent's socket and
 * PID are recorded in ~/.ephemera/agent.env so later invocations can find it.
 */

import fs from "fs-extra";
import os from "os";
import path from "path";
import { BaseOperation, type OperationRuntime } from "../base/base-operation";
import { LABEL_PREFIX } from "../constants";
import { shellQuote } from "../remote/ssh-remote-shell";
import { runCommand, type CommandRunner } from "../utils/run-command";

export type AgentStatus = "running-with-keys" | "running-empty" | "not-running";

export interface AgentEnvironment {
  authSock: string;
  agentPid?: number;
}

export interface AgentStatusReport {
  status: AgentStatus;
  /** Fingerprint lines from `ssh-add -l` */
  keys: string[];
  environment?: AgentEnvironment;
}

export interface AgentStartResult {
  environment: AgentEnvironment;
  reused: boolean;
}

export class AgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentError";
  }
}

export interface CredentialAgentManagerOptions extends OperationRuntime {
  /** Directory holding agent.env (default ~/.ephemera) */
  stateDir?: string;
  runner?: CommandRunner;
  /** Environment inherited by agent commands (default process.env) */
  env?: NodeJS.ProcessEnv;
}

export const AGENT_ENV_FILE = "agent.env";

export class CredentialAgentManager extends BaseOperation {
  private readonly envFile: string;
  private readonly runner: CommandRunner;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: CredentialAgentManagerOptions = {}) {
    super(options);
    const stateDir = options.stateDir ?? path.join(os.homedir(), `.${LABEL_PREFIX}`);
    this.envFile = path.join(stateDir, AGENT_ENV_FILE);
    this.runner = options.runner ?? runCommand;
    this.baseEnv = options.env ?? process.env;
  }

  get envFilePath(): string {
    return this.envFile;
  }

  /**
   * Report whether an agent is reachable and whether it holds keys.
   * The recorded agent takes precedence over SSH_AUTH_SOCK from the environment.
   */
  async status(): Promise<AgentStatusReport> {
    const environment = (await this.readRecorded()) ?? this.inherited();
    if (!environment) {
      return { status: "not-running", keys: [] };
    }
    return this.probe(environment);
  }

  /** Reuse the recorded agent when it is alive, otherwise start a new one */
  async start(): Promise<AgentStartResult> {
    const recorded = await this.readRecorded();
    if (recorded) {
      const report = await this.probe(recorded);
      if (report.status !== "not-running") {
        this.logFields("agent", { event: "reused", pid: recorded.agentPid, socket: recorded.authSock });
        return { environment: recorded, reused: true };
      }
      this.logFields("agent", { event: "stale", socket: recorded.authSock }, "stderr");
    }

    const result = await this.runner("ssh-agent", ["-s"], { env: this.baseEnv });
    if (result.exitCode !== 0) {
      throw new AgentError(`ssh-agent exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }

    const environment = parseAgentEnvironment(result.stdout);
    if (!environment) {
      throw new AgentError("Could not read SSH_AUTH_SOCK from ssh-agent output");
    }

    await fs.ensureDir(path.dirname(this.envFile));
    await fs.writeFile(this.envFile, formatAgentEnvironment(environment), { mode: 0o600 });

    this.logFields("agent", { event: "started", pid: environment.agentPid, socket: environment.authSock });
    return { environment, reused: false };
  }

  /**
   * Load a private key into the running agent.
   *
   * @param lifetimeSeconds - Drop the key from the agent after this many seconds
   */
  async addKey(keyPath: string, lifetimeSeconds?: number): Promise<void> {
    if (!(await fs.pathExists(keyPath))) {
      throw new AgentError(`Key file not found: ${keyPath}`);
    }
    if (lifetimeSeconds !== undefined && (!Number.isInteger(lifetimeSeconds) || lifetimeSeconds <= 0)) {
      throw new AgentError(`Key lifetime must be a positive number of seconds, got ${lifetimeSeconds}`);
    }

    const report = await this.status();
    if (report.status === "not-running" || !report.environment) {
      throw new AgentError(`No running agent; run "${LABEL_PREFIX} agent start" first`);
    }

    const args = lifetimeSeconds === undefined ? [keyPath] : ["-t", String(lifetimeSeconds), keyPath];
    const result = await this.runner("ssh-add", args, { env: this.agentEnv(report.environment) });
    if (result.exitCode !== 0) {
      throw new AgentError(`ssh-add failed for ${keyPath}: ${result.stderr.trim()}`);
    }

    this.logFields("agent", { event: "key-added", key: keyPath, lifetimeSeconds });
  }

  /**
   * Kill the recorded agent and forget it.
   *
   * @returns false when no agent was recorded
   */
  async stop(): Promise<boolean> {
    const recorded = await this.readRecorded();
    if (!recorded) {
      return false;
    }

    const result = await this.runner("ssh-agent", ["-k"], { env: this.agentEnv(recorded) });
    if (result.exitCode !== 0) {
      this.logFields(
        "agent",
        { event: "kill-failed", level: "warn", pid: recorded.agentPid, error: result.stderr.trim() },
        "stderr",
      );
    }

    await fs.remove(this.envFile);
    this.logFields("agent", { event: "stopped", pid: recorded.agentPid });
    return true;
  }

  /** Shell lines that point the current shell at the recorded agent */
  async env(): Promise<string> {
    const recorded = await this.readRecorded();
    if (!recorded) {
      throw new AgentError(`No agent recorded in ${this.envFile}; run "${LABEL_PREFIX} agent start" first`);
    }
    return formatAgentEnvironment(recorded);
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private async probe(environment: AgentEnvironment): Promise<AgentStatusReport> {
    const result = await this.runner("ssh-add", ["-l"], { env: this.agentEnv(environment) });

    switch (result.exitCode) {
      case 0:
        return {
          status: "running-with-keys",
          keys: result.stdout.split("\n").map((line) => line.trim()).filter(Boolean),
          environment,
        };
      case 1:
        return { status: "running-empty", keys: [], environment };
      case 2:
        return { status: "not-running", keys: [] };
      default:
        throw new AgentError(`ssh-add -l exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }

  private async readRecorded(): Promise<AgentEnvironment | undefined> {
    if (!(await fs.pathExists(this.envFile))) {
      return undefined;
    }
    return parseAgentEnvironment(await fs.readFile(this.envFile, "utf-8"));
  }

  private inherited(): AgentEnvironment | undefined {
    const authSock = this.baseEnv.SSH_AUTH_SOCK;
    if (!authSock) return undefined;
    const pid = Number(this.baseEnv.SSH_AGENT_PID);
    return { authSock, agentPid: Number.isInteger(pid) && pid > 0 ? pid : undefined };
  }

  private agentEnv(environment: AgentEnvironment): NodeJS.ProcessEnv {
    return {
      ...this.baseEnv,
      SSH_AUTH_SOCK: environment.authSock,
      SSH_AGENT_PID: environment.agentPid === undefined ? undefined : String(environment.agentPid),
    };
  }
}

/**
 * Read SSH_AUTH_SOCK and SSH_AGENT_PID from `ssh-agent -s` output or an env file.
 * The socket may be bare or single-quoted.
 */
export function parseAgentEnvironment(text: string): AgentEnvironment | undefined {
  const sock = /SSH_AUTH_SOCK=(?:'((?:[^']|'\\'')*)'|([^;\s]+))/.exec(text);
  if (!sock) return undefined;
  const authSock = sock[1] === undefined ? sock[2] : sock[1].replace(/'\\''/g, "'");
  const pid = /SSH_AGENT_PID=(\d+)/.exec(text);
  return { authSock, agentPid: pid ? Number(pid[1]) : undefined };
}

export function formatAgentEnvironment(environment: AgentEnvironment): string {
  const lines = [`export SSH_AUTH_SOCK=${shellQuote(environment.authSock)}`];
  if (environment.agentPid !== undefined) {
    lines.push(`export SSH_AGENT_PID=${environment.agentPid}`);
  }
  return `${lines.join("\n")}\n`;
}
