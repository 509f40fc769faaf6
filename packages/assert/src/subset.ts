/**
 * Structural subset matching for `isSubset`.
 *
 * Plain objects match on the subset's own keys and arrays as prefixes; every
 * other value is compared with `isDeepStrictEqual`.
 */
import { isDeepStrictEqual } from "node:util";

export type SubsetMismatchKind = "missing-key" | "too-short" | "wrong-shape" | "unequal";

export interface SubsetMismatch {
  kind: SubsetMismatchKind;
  /** `$`, `$.key`, `$.items[2]` ... */
  path: string;
  expected: unknown;
  actual: unknown;
}

type Segment = string | number;

interface Pending {
  actual: unknown;
  subset: unknown;
  at: readonly Segment[];
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function shapeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (isPlainRecord(value)) return "object";
  return typeof value;
}

function formatPath(at: readonly Segment[]): string {
  return "$" + at.map((s) => (typeof s === "number" ? `[${s}]` : `.${s}`)).join("");
}

export function formatValue(value: unknown): string {
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return String(value);
  }
}

/**
 * First place, in document order, where `actual` does not contain `subset`.
 * Missing keys of an object are reported before mismatches inside it.
 */
export function findSubsetMismatch(actual: unknown, subset: unknown): SubsetMismatch | null {
  const stack: Pending[] = [{ actual, subset, at: [] }];
  for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
    const { actual: a, subset: s, at } = next;
    const mismatch = (kind: SubsetMismatchKind, expected: unknown = s, got: unknown = a) => ({
      kind,
      path: formatPath(at),
      expected,
      actual: got,
    });

    if (Array.isArray(s)) {
      if (!Array.isArray(a)) return mismatch("wrong-shape");
      if (a.length < s.length) return mismatch("too-short");
      for (let i = s.length - 1; i >= 0; i--) {
        stack.push({ actual: a[i], subset: s[i], at: [...at, i] });
      }
      continue;
    }

    if (isPlainRecord(s)) {
      if (!isPlainRecord(a)) return mismatch("wrong-shape");
      const keys = Object.keys(s);
      const missing = keys.find((k) => !Object.hasOwn(a, k));
      if (missing !== undefined) {
        return { kind: "missing-key", path: formatPath([...at, missing]), expected: s[missing], actual: undefined };
      }
      for (let i = keys.length - 1; i >= 0; i--) {
        const key = keys[i];
        stack.push({ actual: a[key], subset: s[key], at: [...at, key] });
      }
      continue;
    }

    if (!isDeepStrictEqual(a, s)) return mismatch("unequal");
  }
  return null;
}

export function describeMismatch(m: SubsetMismatch): string {
  switch (m.kind) {
    case "missing-key":
      return `${m.path}: key missing`;
    case "too-short":
      return `${m.path}: expected at least ${shapeLength(m.expected)} items but got ${shapeLength(m.actual)}`;
    case "wrong-shape":
      return `${m.path}: expected ${shapeOf(m.expected)} but got ${shapeOf(m.actual)}`;
    case "unequal":
      return `${m.path}: expected ${formatValue(m.expected)} but got ${formatValue(m.actual)}`;
  }
}

function shapeLength(value: unknown): number {
  return Array.isArray(value) ? value.length : 0;
}
