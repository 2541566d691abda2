/**
 * Persistent volume type definitions.
 */

/**
 * Volume availability as seen by the attach step.
 * "unavailable" covers transitional or failed provider states (creating, error).
 */
export type VolumeAvailability = "available" | "in-use" | "missing" | "unavailable";

/** A volume to attach once the instance is healthy */
export interface PersistentVolumeAttachment {
  /** Provider volume ID (vol-...) */
  volumeId: string;
  /** Device path exposed to the guest (e.g. "/dev/sdf") */
  devicePath: string;
}

/** What happened to the optional volume step */
export interface VolumeAttachmentOutcome {
  volumeId: string;
  devicePath: string;
  status: "attached" | "skipped";
  /** Why the volume was skipped */
  reason?: string;
}
