import type { VolumeAttachmentOutcome } from "./volume";

/**
 * Terminal success artifact of the readiness poller.
 * Handed to the configuration pipeline, which treats it as read-only.
 */
export interface ReadyInstance {
  readonly instanceId: string;
  readonly instanceType: string;
  /** Public IP, or public DNS name when no IP is reported */
  readonly publicAddress?: string;
  readonly privateAddress?: string;
  /** Present only when a volume was configured */
  readonly volume?: Readonly<VolumeAttachmentOutcome>;
}
