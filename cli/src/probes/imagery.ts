import type { BinaryResponse } from "@keycheck/clients";
import { writeArtifact } from "../utils/output";
import { noData, prerequisite, succeeded, type Endpoint, type ProbeAttempt, type Probe } from "./types";

/** "image/png, 12KB". A missing or non-numeric Content-Length counts as 0. */
export function describeImage(headers: Record<string, string>): string {
  const length = Number(headers["content-length"] ?? 0);
  const sizeKb = Number.isFinite(length) ? Math.floor(length / 1024) : 0;
  return `${headers["content-type"] ?? ""}, ${sizeKb}KB`;
}

async function saveImage(
  endpoint: Endpoint,
  res: BinaryResponse,
  outputDir: string,
  fileName: string
): Promise<ProbeAttempt> {
  if (res.status !== 200) {
    return noData(res.status, res.status === null ? "request failed" : `HTTP ${res.status}`);
  }
  await writeArtifact(outputDir, fileName, res.bytes);
  return succeeded(endpoint, res.status, describeImage(res.headers), res.headers);
}

export const staticMapProbe: Probe = {
  endpoint: "staticmap",
  requires: ["coordinates"],
  async run({ client, outputDir }, ctx) {
    const res = await client.staticMap(prerequisite(ctx, "coordinates"));
    return saveImage("staticmap", res, outputDir, "staticmap.png");
  },
};

export const streetViewProbe: Probe = {
  endpoint: "streetview",
  requires: ["coordinates"],
  async run({ client, outputDir }, ctx) {
    const res = await client.streetView(prerequisite(ctx, "coordinates"));
    return saveImage("streetview", res, outputDir, "streetview.jpg");
  },
};
