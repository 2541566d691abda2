/**
 * Terminal failures of the readiness poller.
 *
 * Every failure is tagged with a kind and the axis that failed, and carries
 * the last snapshot the poller saw so callers can report what went wrong.
 */

import type { InstanceStatusSnapshot } from "@ephemera/adapters-common";
import type { ReadinessState, StatusAxis } from "./readiness-state";

export type ReadinessErrorKind =
  | "precondition"
  | "lifecycle-regression"
  | "timeout"
  | "transient-query"
  | "not-found"
  | "query-failed"
  | "cancelled";

export interface ReadinessErrorContext {
  axis: StatusAxis;
  instanceId?: string;
  lastSnapshot?: InstanceStatusSnapshot;
  attempts?: number;
  elapsedMs?: number;
  cause?: unknown;
}

export abstract class ReadinessError extends Error {
  abstract readonly kind: ReadinessErrorKind;

  readonly axis: StatusAxis;
  readonly instanceId?: string;
  readonly lastSnapshot?: InstanceStatusSnapshot;
  readonly attempts: number;
  readonly elapsedMs: number;

  constructor(message: string, context: ReadinessErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.axis = context.axis;
    this.instanceId = context.instanceId;
    this.lastSnapshot = context.lastSnapshot;
    this.attempts = context.attempts ?? 0;
    this.elapsedMs = context.elapsedMs ?? 0;
  }
}

/** Bad or missing input; never retried */
export class PreconditionError extends ReadinessError {
  readonly kind = "precondition";

  constructor(message: string, instanceId?: string) {
    super(message, { axis: "input", instanceId });
    this.name = "PreconditionError";
  }
}

/** The instance started moving away from usability */
export class LifecycleRegressionError extends ReadinessError {
  readonly kind = "lifecycle-regression";

  constructor(
    public readonly fromState: ReadinessState,
    context: ReadinessErrorContext & { instanceId: string; lastSnapshot: InstanceStatusSnapshot },
  ) {
    super(
      `Instance ${context.instanceId} entered lifecycle state "${context.lastSnapshot.lifecycleState}" while in ${fromState}`,
      context,
    );
    this.name = "LifecycleRegressionError";
  }
}

/** The wait policy ran out before the instance became ready */
export class ReadinessTimeoutError extends ReadinessError {
  readonly kind = "timeout";

  constructor(bound: string, context: ReadinessErrorContext & { instanceId: string }) {
    super(
      `Instance ${context.instanceId} not ready after ${context.attempts ?? 0} attempts in ${context.elapsedMs ?? 0}ms (limit ${bound}), still waiting on ${context.axis}`,
      context,
    );
    this.name = "ReadinessTimeoutError";
  }
}

/** A provider query failed and retrying did not help */
export class QueryFailedError extends ReadinessError {
  constructor(
    readonly kind: "transient-query" | "not-found" | "query-failed",
    message: string,
    context: ReadinessErrorContext,
  ) {
    super(message, context);
    this.name = "QueryFailedError";
  }
}

/** The caller aborted the wait */
export class PollCancelledError extends ReadinessError {
  readonly kind = "cancelled";

  constructor(context: ReadinessErrorContext) {
    super(`Readiness polling cancelled${context.instanceId ? ` for ${context.instanceId}` : ""}`, context);
    this.name = "PollCancelledError";
  }
}
