import {
  DistanceMatrixResponseSchema,
  ElevationResponseSchema,
  GeolocateResponseSchema,
  TimeZoneResponseSchema,
} from "@keycheck/clients";
import { parseBody } from "./parse";
import { noData, prerequisite, succeeded, type Probe } from "./types";

/** Origin and destination are both the geocoded point. */
export const distanceMatrixProbe: Probe = {
  endpoint: "distancematrix",
  requires: ["coordinates"],
  async run({ client }, ctx) {
    const coordinates = prerequisite(ctx, "coordinates");
    const res = await client.distanceMatrix(coordinates, coordinates);
    const body = parseBody(DistanceMatrixResponseSchema, res);
    if (!body.ok) return body.attempt;

    const element = body.data.rows[0]?.elements[0];
    if (!element?.distance || !element.duration) return noData(res.status, "no route element");

    return succeeded(
      "distancematrix",
      res.status,
      `${element.distance.text}, ${element.duration.text}`,
      res.data
    );
  },
};

export const elevationProbe: Probe = {
  endpoint: "elevation",
  requires: ["coordinates"],
  async run({ client }, ctx) {
    const res = await client.elevation(prerequisite(ctx, "coordinates"));
    const body = parseBody(ElevationResponseSchema, res);
    if (!body.ok) return body.attempt;

    const first = body.data.results[0];
    if (!first) return noData(res.status, "no results");
    return succeeded("elevation", res.status, `${first.elevation ?? ""}m`, res.data);
  },
};

export const timeZoneProbe: Probe = {
  endpoint: "timezone",
  requires: ["coordinates"],
  async run({ client, now }, ctx) {
    const timestamp = Math.floor(now().getTime() / 1000);
    const res = await client.timeZone(prerequisite(ctx, "coordinates"), timestamp);
    const body = parseBody(TimeZoneResponseSchema, res);
    if (!body.ok) return body.attempt;

    const zone = body.data.timeZoneId;
    if (!zone) return noData(res.status, "no timeZoneId");
    return succeeded("timezone", res.status, zone, res.data);
  },
};

function asInfo(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Always reported. Info is the IP-based "lat,lng", or the error payload when
 * the key is not allowed to geolocate.
 */
export const geolocateProbe: Probe = {
  endpoint: "geolocate",
  requires: [],
  async run({ client }) {
    const res = await client.geolocate();
    const parsed = GeolocateResponseSchema.safeParse(res.data);
    const data = parsed.success ? parsed.data : undefined;

    const lat = data?.location?.lat;
    const lng = data?.location?.lng;
    const info =
      lat != null && lng != null
        ? `${lat},${lng}`
        : asInfo(data?.error ?? data?.status ?? "UNKNOWN");

    return succeeded("geolocate", res.status, info, res.data);
  },
};
