import fs from "fs/promises";
import path from "path";
import { keyFingerprint } from "./key";

/** `<root>/<fingerprint>`. Not created until something is written. */
export function outputDirFor(root: string, apiKey: string): string {
  return path.join(root, keyFingerprint(apiKey));
}

export async function writeArtifact(
  dir: string,
  name: string,
  data: string | Uint8Array
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const dest = path.join(dir, name);
  await fs.writeFile(dest, data);
  return dest;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Minimal quoting, CRLF row terminators. */
export function toCsv(rows: string[][]): string {
  return rows.map((row) => row.map(csvField).join(",") + "\r\n").join("");
}
