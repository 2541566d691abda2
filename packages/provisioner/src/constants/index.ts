/**
 * Constants Module
 *
 * Re-exports all constants for provisioning operations including
 * timeouts, default values, and resource labeling.
 */

export * from "./timeouts";
export * from "./defaults";
export * from "./labels";
