// Interfaces
export type { IFleetService } from "./interfaces/fleet-service";
export type { IInstanceStatusService } from "./interfaces/instance-status-service";
export type { IVolumeService } from "./interfaces/volume-service";
export type { IRemoteShell } from "./interfaces/remote-shell";

// Types
export type {
  LifecycleState,
  HealthStatus,
  InstanceHandle,
  LaunchTemplateRef,
  LaunchOverrides,
  CapacityType,
  InstanceRequest,
  InstanceStatusSnapshot,
  InstanceDetails,
} from "./types/instance";
export type {
  VolumeAvailability,
  PersistentVolumeAttachment,
  VolumeAttachmentOutcome,
} from "./types/volume";
export type { ReadyInstance } from "./types/ready-instance";

// Errors
export {
  ProvisionError,
  TransientQueryError,
  NotFoundError,
  AttachError,
} from "./errors/collaborator-errors";

// Utilities
export { MAX_TAG_VALUE_LENGTH, sanitizeTagValue, sanitizeUsername } from "./utils/sanitize";
export {
  classifyLifecycleState,
  classifyHealthStatus,
  isLifecycleRegression,
  REGRESSED_LIFECYCLE_STATES,
} from "./utils/status-vocabulary";
