import {
  isLifecycleRegression,
  type InstanceStatusSnapshot,
} from "@ephemera/adapters-common";

/**
 * States of the readiness protocol, in the order a healthy launch visits them.
 */
export enum ReadinessState {
  AWAITING_LIFECYCLE = "AwaitingLifecycle",
  AWAITING_SYSTEM_STATUS = "AwaitingSystemStatus",
  AWAITING_INSTANCE_STATUS = "AwaitingInstanceStatus",
  VOLUME_ATTACHMENT = "VolumeAttachment",
  READY = "Ready",
  FAILED = "Failed",
}

/** States in which the poller re-queries the provider */
export type PollingState =
  | ReadinessState.AWAITING_LIFECYCLE
  | ReadinessState.AWAITING_SYSTEM_STATUS
  | ReadinessState.AWAITING_INSTANCE_STATUS;

/** Which part of the readiness check an outcome refers to */
export type StatusAxis = "input" | "lifecycle" | "system-status" | "instance-status" | "volume";

export const STATE_ORDER: readonly ReadinessState[] = [
  ReadinessState.AWAITING_LIFECYCLE,
  ReadinessState.AWAITING_SYSTEM_STATUS,
  ReadinessState.AWAITING_INSTANCE_STATUS,
  ReadinessState.VOLUME_ATTACHMENT,
  ReadinessState.READY,
];

/** Result of applying one snapshot to the current polling state */
export type SnapshotDecision =
  | { kind: "wait"; state: PollingState; waitingOn: StatusAxis }
  | { kind: "healthy" }
  | { kind: "regressed" };

export function axisForState(state: ReadinessState): StatusAxis {
  switch (state) {
    case ReadinessState.AWAITING_LIFECYCLE:
      return "lifecycle";
    case ReadinessState.AWAITING_SYSTEM_STATUS:
      return "system-status";
    case ReadinessState.AWAITING_INSTANCE_STATUS:
      return "instance-status";
    case ReadinessState.VOLUME_ATTACHMENT:
      return "volume";
    default:
      return "input";
  }
}

/**
 * Apply a snapshot to the current state.
 *
 * A snapshot that already satisfies later states advances through them at once,
 * so a fully healthy instance is recognized on the first query. Lifecycle
 * regression is checked on every snapshot; a system check that drops back
 * from ok sends the poller back to AwaitingSystemStatus.
 */
export function evaluateSnapshot(
  state: PollingState,
  snapshot: InstanceStatusSnapshot,
): SnapshotDecision {
  if (isLifecycleRegression(snapshot.lifecycleState)) {
    return { kind: "regressed" };
  }

  if (state === ReadinessState.AWAITING_LIFECYCLE && snapshot.lifecycleState !== "running") {
    return { kind: "wait", state, waitingOn: "lifecycle" };
  }

  if (snapshot.systemStatus !== "ok") {
    return {
      kind: "wait",
      state: ReadinessState.AWAITING_SYSTEM_STATUS,
      waitingOn: "system-status",
    };
  }

  // Once running has been seen, an absent lifecycle value is a gap in the
  // provider's data, not a reason to go back to AwaitingLifecycle.
  if (snapshot.lifecycleState !== "running") {
    return {
      kind: "wait",
      state: ReadinessState.AWAITING_INSTANCE_STATUS,
      waitingOn: "lifecycle",
    };
  }

  if (snapshot.instanceStatus !== "ok") {
    return {
      kind: "wait",
      state: ReadinessState.AWAITING_INSTANCE_STATUS,
      waitingOn: "instance-status",
    };
  }

  return { kind: "healthy" };
}
