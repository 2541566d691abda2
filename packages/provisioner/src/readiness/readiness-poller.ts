/**
 * Readiness Poller
 *
 * Drives a freshly requested instance through
 * AwaitingLifecycle → AwaitingSystemStatus → AwaitingInstanceStatus
 * → [VolumeAttachment] → Ready, or into Failed.
 *
 * One provider query per attempt: lifecycle regression is detected from the
 * same snapshot that carries the health checks. Each call keeps its own state,
 * so one poller can serve any number of sequential or concurrent calls.
 */

import { ZodError } from "zod";
import {
  NotFoundError,
  TransientQueryError,
  classifyHealthStatus,
  classifyLifecycleState,
  type IInstanceStatusService,
  type IVolumeService,
  type InstanceDetails,
  type InstanceHandle,
  type InstanceStatusSnapshot,
  type PersistentVolumeAttachment,
  type ReadyInstance,
  type VolumeAttachmentOutcome,
} from "@ephemera/adapters-common";
import {
  BaseOperation,
  OperationCancelledError,
  type LogCallback,
  type OperationRuntime,
} from "../base/base-operation";
import {
  TRANSIENT_RETRY_ATTEMPTS,
  TRANSIENT_RETRY_BACKOFF,
  TRANSIENT_RETRY_DELAY_MS,
} from "../constants";
import { VolumeAttacher, type QueryRetryPolicy } from "../volume/volume-attacher";
import {
  LifecycleRegressionError,
  PollCancelledError,
  PreconditionError,
  QueryFailedError,
  ReadinessError,
  ReadinessTimeoutError,
} from "./readiness-errors";
import {
  ReadinessState,
  STATE_ORDER,
  axisForState,
  evaluateSnapshot,
  type PollingState,
  type StatusAxis,
} from "./readiness-state";
import { describeWaitPolicy, resolveWaitPolicy, type WaitPolicy } from "./wait-policy";

export interface ReadinessPollerOptions extends OperationRuntime {
  statusService: IInstanceStatusService;
  /** Always passed through resolveWaitPolicy(); defaults apply to missing fields */
  waitPolicy?: WaitPolicy;
  /** Volume to attach once the instance is healthy */
  volume?: PersistentVolumeAttachment;
  /** Required when a volume is configured */
  volumeService?: IVolumeService;
  /** Backoff for transient provider errors within one attempt */
  queryRetry?: QueryRetryPolicy;
}

export interface WaitUntilReadyOptions {
  /** Aborts the wait between attempts and during retry backoff */
  signal?: AbortSignal;
  /**
   * The instance was requested moments ago. Until the provider first returns
   * it, "not found" counts as not ready instead of failing the poll.
   */
  recentlyCreated?: boolean;
}

/** Mutable state of a single waitUntilReady call */
interface PollRun {
  readonly handle: InstanceHandle;
  readonly signal?: AbortSignal;
  readonly startedAt: number;
  readonly recentlyCreated: boolean;
  /** Set once the provider has returned a snapshot */
  visible: boolean;
  state: ReadinessState;
  attempts: number;
  lastSnapshot?: InstanceStatusSnapshot;
}

export class ReadinessPoller extends BaseOperation {
  private readonly statusService: IInstanceStatusService;
  private readonly waitPolicy: WaitPolicy;
  private readonly volume?: Readonly<PersistentVolumeAttachment>;
  private readonly volumeAttacher?: VolumeAttacher;
  private readonly queryRetry: Required<QueryRetryPolicy>;

  constructor(options: ReadinessPollerOptions) {
    super(options);

    this.statusService = options.statusService;
    this.waitPolicy = resolvePollerWaitPolicy(options.waitPolicy);
    this.queryRetry = {
      maxAttempts: options.queryRetry?.maxAttempts ?? TRANSIENT_RETRY_ATTEMPTS,
      delayMs: options.queryRetry?.delayMs ?? TRANSIENT_RETRY_DELAY_MS,
      backoffMultiplier: options.queryRetry?.backoffMultiplier ?? TRANSIENT_RETRY_BACKOFF,
    };

    if (options.volume) {
      if (!options.volumeService) {
        throw new PreconditionError(
          `Volume ${options.volume.volumeId} is configured but no volume service was provided`,
        );
      }
      this.volume = Object.freeze({ ...options.volume });
      this.volumeAttacher = new VolumeAttacher(options.volumeService, {
        sleep: options.sleep,
        now: options.now,
        retry: options.queryRetry,
      });
    }
  }

  override setLogCallback(cb: LogCallback): void {
    super.setLogCallback(cb);
    this.volumeAttacher?.setLogCallback(cb);
  }

  /**
   * Poll until the instance is ready or a terminal failure occurs.
   *
   * @throws PreconditionError when the handle is missing or empty
   * @throws LifecycleRegressionError when the instance starts stopping or terminating
   * @throws ReadinessTimeoutError when the wait policy is exhausted
   * @throws QueryFailedError when a provider query keeps failing or the instance is unknown
   * @throws PollCancelledError when the signal aborts
   */
  async waitUntilReady(
    handle: InstanceHandle | null | undefined,
    options: WaitUntilReadyOptions = {},
  ): Promise<ReadyInstance> {
    const instanceId = handle?.instanceId?.trim();
    if (!instanceId) {
      this.logFields("readiness", { to: ReadinessState.FAILED, kind: "precondition" }, "stderr");
      throw new PreconditionError("Instance handle is missing or empty");
    }

    const run: PollRun = {
      handle: { instanceId },
      signal: options.signal,
      startedAt: this.now(),
      recentlyCreated: options.recentlyCreated ?? false,
      visible: false,
      state: ReadinessState.AWAITING_LIFECYCLE,
      attempts: 0,
    };
    this.logTransition(run, undefined, run.state);

    for (;;) {
      if (run.signal?.aborted) {
        throw this.fail(run, new PollCancelledError(this.errorContext(run)));
      }

      const snapshot = await this.querySnapshot(run);
      run.attempts++;
      run.lastSnapshot = snapshot;

      const decision = evaluateSnapshot(this.currentPollingState(run), snapshot);

      if (decision.kind === "regressed") {
        throw this.fail(
          run,
          new LifecycleRegressionError(run.state, {
            ...this.errorContext(run),
            axis: "lifecycle",
            instanceId,
            lastSnapshot: snapshot,
          }),
        );
      }

      if (decision.kind === "healthy") {
        this.moveTo(run, ReadinessState.AWAITING_INSTANCE_STATUS);
        break;
      }

      this.moveTo(run, decision.state);
      await this.waitForNextAttempt(run, decision.waitingOn);
    }

    const details = await this.queryDetails(run);

    let volume: VolumeAttachmentOutcome | undefined;
    if (this.volume && this.volumeAttacher) {
      this.moveTo(run, ReadinessState.VOLUME_ATTACHMENT);
      try {
        volume = await this.volumeAttacher.attach(run.handle, this.volume, run.signal);
      } catch (error) {
        throw this.toFailure(run, error);
      }
    }

    const ready: ReadyInstance = Object.freeze({
      instanceId,
      instanceType: details.instanceType,
      publicAddress: details.publicIpAddress ?? details.publicDnsName,
      privateAddress: details.privateIpAddress,
      volume: volume ? Object.freeze(volume) : undefined,
    });

    this.moveTo(run, ReadinessState.READY);
    this.logFields("readiness", {
      event: "ready",
      instanceId,
      instanceType: ready.instanceType,
      publicAddress: ready.publicAddress ?? null,
      volume: volume?.status,
    });
    return ready;
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private currentPollingState(run: PollRun): PollingState {
    switch (run.state) {
      case ReadinessState.AWAITING_SYSTEM_STATUS:
      case ReadinessState.AWAITING_INSTANCE_STATUS:
        return run.state;
      default:
        return ReadinessState.AWAITING_LIFECYCLE;
    }
  }

  private async querySnapshot(run: PollRun): Promise<InstanceStatusSnapshot> {
    try {
      const snapshot = await this.withRetry(
        () => this.statusService.describeInstanceStatus(run.handle),
        {
          ...this.queryRetry,
          description: `DescribeInstanceStatus ${run.handle.instanceId}`,
          shouldRetry: (error) => error instanceof TransientQueryError,
          signal: run.signal,
        },
      );
      run.visible = true;
      return snapshot;
    } catch (error) {
      if (error instanceof NotFoundError && run.recentlyCreated && !run.visible) {
        this.logFields("readiness", {
          event: "not-visible-yet",
          instanceId: run.handle.instanceId,
          attempt: run.attempts + 1,
        });
        return this.absentSnapshot();
      }
      throw this.toFailure(run, error);
    }
  }

  private absentSnapshot(): InstanceStatusSnapshot {
    return {
      lifecycleState: classifyLifecycleState(null),
      systemStatus: classifyHealthStatus(null),
      instanceStatus: classifyHealthStatus(null),
      raw: { lifecycleState: null, systemStatus: null, instanceStatus: null },
      observedAt: new Date(this.now()),
    };
  }

  private async queryDetails(run: PollRun): Promise<InstanceDetails> {
    try {
      return await this.withRetry(() => this.statusService.describeInstance(run.handle), {
        ...this.queryRetry,
        description: `DescribeInstance ${run.handle.instanceId}`,
        shouldRetry: (error) => error instanceof TransientQueryError,
        signal: run.signal,
      });
    } catch (error) {
      throw this.toFailure(run, error);
    }
  }

  /**
   * Enforce the wait policy, then sleep until the next attempt.
   * The last sleep is clipped so the final query lands on the deadline.
   */
  private async waitForNextAttempt(run: PollRun, waitingOn: StatusAxis): Promise<void> {
    const { pollIntervalMs, maxAttempts, timeoutMs } = this.waitPolicy;
    let delayMs = pollIntervalMs;

    if (maxAttempts !== undefined && run.attempts >= maxAttempts) {
      throw this.timeout(run, waitingOn);
    }

    if (timeoutMs !== undefined) {
      const remainingMs = timeoutMs - (this.now() - run.startedAt);
      if (remainingMs <= 0) {
        throw this.timeout(run, waitingOn);
      }
      delayMs = Math.min(delayMs, remainingMs);
    }

    try {
      await this.sleep(delayMs, run.signal);
    } catch (error) {
      throw this.toFailure(run, error);
    }
  }

  private timeout(run: PollRun, waitingOn: StatusAxis): ReadinessTimeoutError {
    return this.fail(
      run,
      new ReadinessTimeoutError(describeWaitPolicy(this.waitPolicy), {
        ...this.errorContext(run),
        axis: waitingOn,
        instanceId: run.handle.instanceId,
      }),
    );
  }

  private toFailure(run: PollRun, error: unknown): ReadinessError {
    if (error instanceof ReadinessError) return error;

    const context = { ...this.errorContext(run), cause: error };
    if (error instanceof OperationCancelledError) {
      return this.fail(run, new PollCancelledError(context));
    }
    if (error instanceof TransientQueryError) {
      return this.fail(
        run,
        new QueryFailedError(
          "transient-query",
          `Provider query kept failing after ${this.queryRetry.maxAttempts} tries: ${error.message}`,
          context,
        ),
      );
    }
    if (error instanceof NotFoundError) {
      return this.fail(
        run,
        new QueryFailedError(
          "not-found",
          `Instance ${run.handle.instanceId} is unknown to the provider`,
          context,
        ),
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return this.fail(run, new QueryFailedError("query-failed", `Provider query failed: ${message}`, context));
  }

  private errorContext(run: PollRun) {
    return {
      axis: axisForState(run.state),
      instanceId: run.handle.instanceId,
      lastSnapshot: run.lastSnapshot,
      attempts: run.attempts,
      elapsedMs: this.now() - run.startedAt,
    };
  }

  private fail<E extends ReadinessError>(run: PollRun, error: E): E {
    this.logTransition(run, run.state, ReadinessState.FAILED, {
      kind: error.kind,
      axis: error.axis,
    });
    run.state = ReadinessState.FAILED;
    return error;
  }

  /**
   * Move to a new state, logging each intermediate state when skipping forward.
   */
  private moveTo(run: PollRun, target: ReadinessState): void {
    if (run.state === target) return;

    const from = STATE_ORDER.indexOf(run.state);
    const to = STATE_ORDER.indexOf(target);
    const path = to > from ? STATE_ORDER.slice(from + 1, to + 1) : [target];

    for (const next of path) {
      if (next === ReadinessState.VOLUME_ATTACHMENT && target !== next) continue;
      this.logTransition(run, run.state, next);
      run.state = next;
    }
  }

  private logTransition(
    run: PollRun,
    from: ReadinessState | undefined,
    to: ReadinessState,
    extra: Record<string, string> = {},
  ): void {
    const raw = run.lastSnapshot?.raw;
    this.logFields(
      "readiness",
      {
        instanceId: run.handle.instanceId,
        from: from ?? "start",
        to,
        elapsedMs: this.now() - run.startedAt,
        attempt: run.attempts,
        lifecycle: raw ? raw.lifecycleState : undefined,
        systemStatus: raw ? raw.systemStatus : undefined,
        instanceStatus: raw ? raw.instanceStatus : undefined,
        ...extra,
      },
      to === ReadinessState.FAILED ? "stderr" : "stdout",
    );
  }
}

function resolvePollerWaitPolicy(policy: WaitPolicy | undefined): WaitPolicy {
  try {
    return resolveWaitPolicy(policy);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new PreconditionError(`Invalid wait policy: ${issues.join("; ")}`);
    }
    throw error;
  }
}
