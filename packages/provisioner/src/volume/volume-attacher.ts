/**
 * Volume Attacher
 *
 * Optional last step before an instance is reported ready. Volume contention
 * must never abort an otherwise healthy launch, so every failure here ends in
 * a "skipped" outcome with a warning instead of an error.
 */

import {
  TransientQueryError,
  type IVolumeService,
  type InstanceHandle,
  type PersistentVolumeAttachment,
  type VolumeAttachmentOutcome,
  type VolumeAvailability,
} from "@ephemera/adapters-common";
import {
  BaseOperation,
  OperationCancelledError,
  type OperationRuntime,
} from "../base/base-operation";
import {
  TRANSIENT_RETRY_ATTEMPTS,
  TRANSIENT_RETRY_BACKOFF,
  TRANSIENT_RETRY_DELAY_MS,
} from "../constants";

export interface QueryRetryPolicy {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
}

export class VolumeAttacher extends BaseOperation {
  private readonly retry: Required<QueryRetryPolicy>;

  constructor(
    private readonly volumeService: IVolumeService,
    runtime: OperationRuntime & { retry?: QueryRetryPolicy } = {},
  ) {
    super(runtime);
    this.retry = {
      maxAttempts: runtime.retry?.maxAttempts ?? TRANSIENT_RETRY_ATTEMPTS,
      delayMs: runtime.retry?.delayMs ?? TRANSIENT_RETRY_DELAY_MS,
      backoffMultiplier: runtime.retry?.backoffMultiplier ?? TRANSIENT_RETRY_BACKOFF,
    };
  }

  /**
   * Attach the volume if the provider reports it available.
   * Only cancellation propagates; every other failure becomes a skip.
   */
  async attach(
    handle: InstanceHandle,
    attachment: PersistentVolumeAttachment,
    signal?: AbortSignal,
  ): Promise<VolumeAttachmentOutcome> {
    const { volumeId, devicePath } = attachment;

    let availability: VolumeAvailability;
    try {
      availability = await this.withRetry(() => this.volumeService.describeVolume(volumeId), {
        ...this.retry,
        description: `DescribeVolume ${volumeId}`,
        shouldRetry: (error) => error instanceof TransientQueryError,
        signal,
      });
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      return this.skip(attachment, `describe failed: ${errorMessage(error)}`);
    }

    this.logFields("volume", { event: "described", volumeId, availability });

    if (availability !== "available") {
      return this.skip(attachment, `volume is ${availability}`);
    }

    try {
      await this.volumeService.attachVolume(handle, volumeId, devicePath);
    } catch (error) {
      return this.skip(attachment, `attach failed: ${errorMessage(error)}`);
    }

    this.logFields("volume", {
      event: "attached",
      volumeId,
      devicePath,
      instanceId: handle.instanceId,
    });
    return { volumeId, devicePath, status: "attached" };
  }

  private skip(
    attachment: PersistentVolumeAttachment,
    reason: string,
  ): VolumeAttachmentOutcome {
    this.logFields(
      "volume",
      {
        event: "skipped",
        level: "warn",
        volumeId: attachment.volumeId,
        devicePath: attachment.devicePath,
        reason,
      },
      "stderr",
    );
    return { ...attachment, status: "skipped", reason };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
