import type { HealthStatus, LifecycleState } from "../types/instance";

const LIFECYCLE_STATES: readonly LifecycleState[] = [
  "pending",
  "running",
  "shutting-down",
  "terminated",
  "stopping",
  "stopped",
];

const HEALTH_STATUSES: readonly HealthStatus[] = [
  "ok",
  "impaired",
  "insufficient-data",
  "not-applicable",
];

/** Lifecycle states that mean the instance is moving away from usability */
export const REGRESSED_LIFECYCLE_STATES: ReadonlySet<LifecycleState> = new Set<LifecycleState>([
  "shutting-down",
  "terminated",
  "stopping",
  "stopped",
]);

function normalize(raw: string | null | undefined): string {
  return (raw ?? "").trim().toLowerCase().replace(/_/g, "-");
}

/**
 * Map a provider lifecycle string onto the closed vocabulary.
 * Absent or unrecognized values become "unknown".
 */
export function classifyLifecycleState(raw: string | null | undefined): LifecycleState {
  const value = normalize(raw);
  return LIFECYCLE_STATES.find((state) => state === value) ?? "unknown";
}

/**
 * Map a provider health-check string onto the closed vocabulary.
 * Absent or unrecognized values (including "initializing") become "unknown".
 */
export function classifyHealthStatus(raw: string | null | undefined): HealthStatus {
  const value = normalize(raw);
  return HEALTH_STATUSES.find((status) => status === value) ?? "unknown";
}

export function isLifecycleRegression(state: LifecycleState): boolean {
  return REGRESSED_LIFECYCLE_STATES.has(state);
}
