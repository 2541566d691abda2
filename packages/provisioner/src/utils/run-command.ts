import { execFile } from "child_process";
import { LOCAL_COMMAND_TIMEOUT_MS } from "../constants";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs a program without a shell and resolves with its exit code.
 * A non-zero exit is a result, not an error; callers decide what it means.
 */
export type CommandRunner = (
  cmd: string,
  args: string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/** The program could not be started, or was killed */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CommandFailedError";
  }
}

export const runCommand: CommandRunner = (cmd, args, options = {}) =>
  new Promise((resolve, reject) => {
    const command = [cmd, ...args].join(" ");
    execFile(
      cmd,
      args,
      { timeout: options.timeoutMs ?? LOCAL_COMMAND_TIMEOUT_MS, env: options.env, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const code: unknown = error.code;
        if (typeof code === "number" && !error.killed) {
          resolve({ exitCode: code, stdout, stderr });
          return;
        }
        const reason = error.killed ? `killed (${error.signal ?? "timeout"})` : error.message;
        reject(new CommandFailedError(`Command failed: ${command}: ${reason}`, command, { cause: error }));
      },
    );
  });
