import { createHash } from "node:crypto";
import fs from "node:fs";

/** Compute SHA256 hash of a file. */
export function computeSha256(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** JSON with object keys sorted at every level, so equal values always hash equally. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
      out[key] = sortKeys(inner);
    }
    return out;
  }
  return value;
}

/** Hash a sequence of parts with a separator that cannot occur inside hex digests. */
export function chainDigest(...parts: string[]): string {
  return computeSha256FromContent(parts.join("\u0000"));
}
