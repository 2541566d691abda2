/**
 * Timeout and polling constants for provisioning operations.
 */

/** Interval between readiness poll attempts */
export const DEFAULT_POLL_INTERVAL_MS = 5_000;

/** Upper bound on readiness polling when no limit is configured (10 minutes) */
export const DEFAULT_READINESS_TIMEOUT_MS = 600_000;

/** Attempts per provider query before a transient error becomes fatal */
export const TRANSIENT_RETRY_ATTEMPTS = 3;

/** First backoff delay for transient provider errors */
export const TRANSIENT_RETRY_DELAY_MS = 1_000;

/** Backoff multiplier for transient provider errors */
export const TRANSIENT_RETRY_BACKOFF = 2;

/** Attempts to open an SSH session on a freshly booted instance */
export const SSH_READY_ATTEMPTS = 6;

/** First delay between SSH connection attempts */
export const SSH_READY_DELAY_MS = 5_000;

/** Timeout for a single remote command (package installs can be slow) */
export const REMOTE_COMMAND_TIMEOUT_MS = 900_000;

/** Timeout for local credential-agent commands */
export const LOCAL_COMMAND_TIMEOUT_MS = 30_000;
