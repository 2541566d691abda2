/**
 * Instance type definitions.
 *
 * Provider-neutral shapes for requesting a compute instance and reading its
 * health back. Status values are closed vocabularies; anything a provider
 * reports outside them is classified as "unknown".
 */

/** Coarse running/stopped phase of an instance */
export type LifecycleState =
  | "pending"
  | "running"
  | "shutting-down"
  | "terminated"
  | "stopping"
  | "stopped"
  | "unknown";

/** Provider health check result (system or instance axis) */
export type HealthStatus =
  | "ok"
  | "impaired"
  | "insufficient-data"
  | "not-applicable"
  | "unknown";

/**
 * Provider-assigned identifier for a compute instance.
 * Sole key for every status query after the instance is requested.
 */
export interface InstanceHandle {
  instanceId: string;
}

/** Launch template reference used by a fleet request */
export interface LaunchTemplateRef {
  /** Launch template ID (lt-...) */
  id?: string;
  /** Launch template name, used when no ID is given */
  name?: string;
  /** Template version; provider default when omitted */
  version?: string;
}

/** Per-request overrides applied on top of the launch template */
export interface LaunchOverrides {
  instanceType?: string;
  subnetId?: string;
  availabilityZone?: string;
}

export type CapacityType = "on-demand" | "spot";

/**
 * What the operator asked for: a fresh instance from a launch template,
 * or an instance that already exists.
 */
export type InstanceRequest =
  | {
      readonly kind: "launch-template";
      readonly launchTemplate: Readonly<LaunchTemplateRef>;
      readonly overrides: Readonly<LaunchOverrides>;
      readonly capacityType: CapacityType;
      readonly tags: Readonly<Record<string, string>>;
    }
  | {
      readonly kind: "existing";
      readonly instanceId: string;
    };

/**
 * Point-in-time read of the three independent status axes.
 * Always fetched fresh; never mutated after creation.
 */
export interface InstanceStatusSnapshot {
  readonly lifecycleState: LifecycleState;
  readonly systemStatus: HealthStatus;
  readonly instanceStatus: HealthStatus;
  /** Strings exactly as the provider reported them, null when absent */
  readonly raw: {
    readonly lifecycleState: string | null;
    readonly systemStatus: string | null;
    readonly instanceStatus: string | null;
  };
  readonly observedAt: Date;
}

/** Addressing and sizing details for an instance */
export interface InstanceDetails {
  instanceId: string;
  instanceType: string;
  publicIpAddress?: string;
  publicDnsName?: string;
  privateIpAddress?: string;
}
