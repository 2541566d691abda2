/**
 * Standard tags for cloud resources.
 */

export const LABEL_PREFIX = "ephemera";

export const RESOURCE_LABELS = {
  MANAGED: `${LABEL_PREFIX}:managed`,
  NAME: "Name",
  LAUNCHED_AT: `${LABEL_PREFIX}:launched-at`,
} as const;

export const MANAGED_VALUE = "true";
