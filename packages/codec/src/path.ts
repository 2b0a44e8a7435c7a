/**
 * Human-readable locations inside a value tree, used in error messages:
 * `$`, `$.name`, `$.items[2]`, `$["odd key"]`.
 */

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const ROOT_PATH = "$";

export function childPath(parent: string, key: string): string {
  return IDENTIFIER.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/** Short type description of something that failed to encode. */
export function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  if (Array.isArray(value)) return "array";
  if ("kind" in value) return `kind ${String(value.kind)}`;
  const name: unknown = value.constructor?.name;
  return typeof name === "string" && name.length > 0 ? `object ${name}` : "object";
}
