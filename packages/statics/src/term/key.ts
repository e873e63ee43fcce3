import type { Exp } from "./nodes.js";

const compareKeys = ([a]: [string, unknown], [b]: [string, unknown]): number =>
  a < b ? -1 : a > b ? 1 : 0;

const canonical = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map(canonical).join(",")}]`;
  }

  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(compareKeys);
    return `{${entries
      .map(([key, entry]) => `${JSON.stringify(key)}:${canonical(entry)}`)
      .join(",")}}`;
  }

  if (typeof value === "number") {
    return String(value);
  }

  return JSON.stringify(value) ?? "null";
};

/**
 * Canonical rendering of a term. Structurally equal terms (ids included)
 * produce the same key regardless of object identity or property order.
 */
export const termKey = (exp: Exp): string => canonical(exp);
