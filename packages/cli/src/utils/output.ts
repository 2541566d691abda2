import chalk from "chalk";
import type { Ora } from "ora";
import type { LogCallback, ProgressCallback } from "@ephemera/provisioner";

export type Verbosity = "quiet" | "normal" | "verbose";

const STEP_HEADER = /^\[\d+\/\d+\] /;

export function verbosityFrom(options: { verbose?: boolean; quiet?: boolean }): Verbosity {
  if (options.quiet) return "quiet";
  return options.verbose ? "verbose" : "normal";
}

/**
 * Whether a library log line is shown at the given verbosity.
 * Normal output keeps step headers and anything written to stderr.
 */
export function shouldShow(line: string, stream: "stdout" | "stderr", verbosity: Verbosity): boolean {
  switch (verbosity) {
    case "quiet":
      return false;
    case "verbose":
      return true;
    default:
      return stream === "stderr" || STEP_HEADER.test(line);
  }
}

function colorize(line: string, stream: "stdout" | "stderr"): string {
  if (stream === "stderr") return chalk.yellow(line);
  if (STEP_HEADER.test(line)) return chalk.cyan(line);
  return chalk.gray(line);
}

/**
 * Log callback that prints around an active spinner.
 */
export function createLogRenderer(verbosity: Verbosity, spinner?: Ora): LogCallback {
  return (line, stream) => {
    if (!shouldShow(line, stream, verbosity)) return;

    const spinning = spinner?.isSpinning ?? false;
    if (spinning) spinner?.clear();
    const write = stream === "stderr" ? console.error : console.log;
    write(colorize(line, stream));
    if (spinning) spinner?.render();
  };
}

/** Progress callback that drives an ora spinner */
export function spinnerProgress(spinner: Ora): ProgressCallback {
  return (step, status, message) => {
    if (status === "complete") {
      spinner.succeed(message || `Completed: ${step}`);
    } else if (status === "error") {
      spinner.fail(message || `Failed: ${step}`);
    } else {
      spinner.start(message || `${step}...`);
    }
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
