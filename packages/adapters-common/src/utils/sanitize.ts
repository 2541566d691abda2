/** EC2 limit on tag value length */
export const MAX_TAG_VALUE_LENGTH = 256;

/**
 * Make a string usable as an EC2 tag value.
 *
 * Tag values may hold letters, digits, spaces and `_ . : / = + - @`.
 * Runs of anything else become a single hyphen; edge hyphens and spaces
 * are trimmed.
 */
export function sanitizeTagValue(value: string, maxLength = MAX_TAG_VALUE_LENGTH): string {
  const sanitized = value
    .replace(/[^A-Za-z0-9 _.:\/=+@-]+/g, "-")
    .replace(/\s+/g, " ")
    .replace(/^[-\s]+|[-\s]+$/g, "")
    .substring(0, maxLength)
    .trimEnd();

  if (!sanitized) {
    throw new Error(`Invalid tag value: "${value}" produces empty sanitized value`);
  }

  return sanitized;
}

/**
 * Sanitize a username for the guest OS.
 * Linux usernames must start with a lowercase letter or underscore and stay under 32 chars.
 */
export function sanitizeUsername(name: string): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "")
    .substring(0, 32);

  if (!/^[a-z_][a-z0-9_-]*$/.test(sanitized)) {
    throw new Error(`Invalid username: "${name}"`);
  }

  return sanitized;
}
