export type FieldValue = string | number | boolean | null | undefined;

function formatValue(value: Exclude<FieldValue, undefined>): string {
  if (value === null) return "null";
  const text = String(value);
  return text === "" || /[\s="]/.test(text) ? JSON.stringify(text) : text;
}

/**
 * Render a structured log line: `[tag] key=value key="value with spaces"`.
 * Undefined fields are dropped; null renders as `null`.
 */
export function formatFields(tag: string, fields: Record<string, FieldValue>): string {
  const parts = Object.entries(fields)
    .filter((entry): entry is [string, Exclude<FieldValue, undefined>] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [`[${tag}]`, ...parts].join(" ");
}
