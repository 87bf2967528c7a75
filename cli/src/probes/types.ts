import type { MapsClient } from "@keycheck/clients";

/** Declared probe order. Later probes read what geocode derives. */
export const ENDPOINTS = [
  "geocode",
  "batchgeocode",
  "staticmap",
  "streetview",
  "photoreference",
  "placedetails",
  "textsearch",
  "distancematrix",
  "elevation",
  "timezone",
  "nearbysearch",
  "autocomplete",
  "snaptoroads",
  "nearestroads",
  "geolocate",
] as const;

export type Endpoint = (typeof ENDPOINTS)[number];

export interface ProbeOutcome {
  readonly endpoint: Endpoint;
  /** null when the request failed at the transport level */
  readonly http: number | null;
  readonly info: string;
  /** JSON body, or the response header map for image probes */
  readonly raw: unknown;
}

export interface RunContext {
  readonly apiKey: string;
  /** Address or "lat,lng" */
  readonly place: string;
  readonly formattedAddress?: string;
  /** "lat,lng" from geocode */
  readonly coordinates?: string;
  readonly placeId?: string;
}

export type Prerequisite = "coordinates" | "placeId";

export type DerivedContext = Partial<Pick<RunContext, "formattedAddress" | Prerequisite>>;

export type ProbeResult =
  | { status: "succeeded"; endpoint: Endpoint; outcome: ProbeOutcome }
  | { status: "no-data"; endpoint: Endpoint; http: number | null; reason: string }
  | { status: "not-attempted"; endpoint: Endpoint; missing: Prerequisite[] };

/** What a probe that was actually run can return. */
export type ProbeAttempt =
  | { status: "succeeded"; outcome: ProbeOutcome; derived?: DerivedContext }
  | { status: "no-data"; http: number | null; reason: string };

export interface ProbeDeps {
  client: MapsClient;
  /** Per-key directory for downloaded artifacts */
  outputDir: string;
  now: () => Date;
}

export interface Probe {
  readonly endpoint: Endpoint;
  readonly requires: readonly Prerequisite[];
  run(deps: ProbeDeps, ctx: RunContext): Promise<ProbeAttempt>;
}

export function succeeded(
  endpoint: Endpoint,
  http: number | null,
  info: string,
  raw: unknown,
  derived?: DerivedContext
): ProbeAttempt {
  return { status: "succeeded", outcome: { endpoint, http, info, raw }, derived };
}

export function noData(http: number | null, reason: string): ProbeAttempt {
  return { status: "no-data", http, reason };
}

/**
 * Read a prerequisite the orchestrator has already checked. Throws if a probe
 * runs out of order.
 */
export function prerequisite(ctx: RunContext, name: Prerequisite): string {
  const value = ctx[name];
  if (value === undefined) {
    throw new Error(`${name} has not been resolved for this run`);
  }
  return value;
}
