import { SnappedPointsResponseSchema } from "@keycheck/clients";
import { parseBody } from "./parse";
import { noData, prerequisite, succeeded, type Probe } from "./types";

/** Snaps a two-point path made of the geocoded point twice. */
export const snapToRoadsProbe: Probe = {
  endpoint: "snaptoroads",
  requires: ["coordinates"],
  async run({ client }, ctx) {
    const coordinates = prerequisite(ctx, "coordinates");
    const res = await client.snapToRoads(`${coordinates}|${coordinates}`);
    const body = parseBody(SnappedPointsResponseSchema, res);
    if (!body.ok) return body.attempt;

    const count = body.data.snappedPoints.length;
    if (count === 0) return noData(res.status, "no snapped points");
    return succeeded("snaptoroads", res.status, `${count} points`, res.data);
  },
};

export const nearestRoadsProbe: Probe = {
  endpoint: "nearestroads",
  requires: ["coordinates"],
  async run({ client }, ctx) {
    const res = await client.nearestRoads(prerequisite(ctx, "coordinates"));
    const body = parseBody(SnappedPointsResponseSchema, res);
    if (!body.ok) return body.attempt;

    const count = body.data.snappedPoints.length;
    if (count === 0) return noData(res.status, "no snapped points");
    return succeeded("nearestroads", res.status, `${count} points`, res.data);
  },
};
