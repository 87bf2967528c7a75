import { createHash } from "crypto";

/** First 8 hex characters of sha1(key). Names the per-key output directory. */
export function keyFingerprint(key: string): string {
  return createHash("sha1").update(key, "utf8").digest("hex").slice(0, 8);
}

/**
 * "ABCD…WXYZ (1a2b3c4d)". Keys too short to keep a hidden middle show only
 * the fingerprint.
 */
export function maskKey(key: string): string {
  const hash = keyFingerprint(key);
  if (key.length <= 8) return `… (${hash})`;
  return `${key.slice(0, 4)}…${key.slice(-4)} (${hash})`;
}

/** Replace every occurrence of the key in `text` with its masked form. */
export function redactKey(text: string, key: string): string {
  if (!key) return text;
  return text.split(key).join(maskKey(key));
}
