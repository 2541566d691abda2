import { CommanderError } from "commander";
import { NotFoundError, ProvisionError } from "@ephemera/adapters-common";
import {
  ConfigError,
  LifecycleRegressionError,
  OperationCancelledError,
  PollCancelledError,
  PreconditionError,
  QueryFailedError,
  ReadinessTimeoutError,
  RemoteCommandError,
} from "@ephemera/provisioner";

export const EXIT_CODES = {
  READY: 0,
  UNEXPECTED: 1,
  BAD_INPUT: 2,
  PROVIDER_REJECTED: 3,
  TIMEOUT: 4,
  LIFECYCLE_REGRESSION: 5,
  QUERY_FAILED: 6,
  REMOTE_CONFIGURATION: 7,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (
    error instanceof PreconditionError ||
    error instanceof ConfigError ||
    error instanceof CommanderError
  ) {
    return EXIT_CODES.BAD_INPUT;
  }
  if (error instanceof ProvisionError) return EXIT_CODES.PROVIDER_REJECTED;
  if (error instanceof ReadinessTimeoutError) return EXIT_CODES.TIMEOUT;
  if (error instanceof LifecycleRegressionError) return EXIT_CODES.LIFECYCLE_REGRESSION;
  if (error instanceof QueryFailedError || error instanceof NotFoundError) {
    return EXIT_CODES.QUERY_FAILED;
  }
  if (error instanceof RemoteCommandError) return EXIT_CODES.REMOTE_CONFIGURATION;
  if (error instanceof PollCancelledError || error instanceof OperationCancelledError) {
    return EXIT_CODES.CANCELLED;
  }
  return EXIT_CODES.UNEXPECTED;
}
