import { createHash } from "crypto";

export type Sha256 = `sha256:${string}`;

export function sha256Prefixed(text: string): Sha256 {
  return `sha256:${createHash("sha256").update(text).digest("hex")}`;
}

const byKey = ([a]: [string, unknown], [b]: [string, unknown]): number => (a < b ? -1 : a > b ? 1 : 0);

/** JSON text with object keys sorted at every depth, so equal values hash equally. */
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v !== "object" || v === null || Array.isArray(v)) return v;
    return Object.fromEntries(Object.entries(v).sort(byKey));
  });
}
