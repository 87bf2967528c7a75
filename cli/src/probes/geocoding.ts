import { GeocodeResponseSchema, StatusResponseSchema } from "@keycheck/clients";
import { toCsv, writeArtifact } from "../utils/output";
import { parseBody } from "./parse";
import { noData, succeeded, type Probe } from "./types";

export const geocodeProbe: Probe = {
  endpoint: "geocode",
  requires: [],
  async run({ client }, ctx) {
    const res = await client.geocode(ctx.place);
    const body = parseBody(GeocodeResponseSchema, res);
    if (!body.ok) return body.attempt;

    if (body.data.status !== "OK") {
      return noData(res.status, `status ${body.data.status}`);
    }
    const first = body.data.results[0];
    if (!first) return noData(res.status, "no results");

    const { lat, lng } = first.geometry.location;
    return succeeded("geocode", res.status, first.formatted_address, res.data, {
      formattedAddress: first.formatted_address,
      coordinates: `${lat},${lng}`,
      placeId: first.place_id,
    });
  },
};

/** Always reported: info is empty on HTTP 200, otherwise the API status. */
export const batchGeocodeProbe: Probe = {
  endpoint: "batchgeocode",
  requires: [],
  async run({ client, outputDir }, ctx) {
    const csv = toCsv([["address"], [ctx.place]]);
    await writeArtifact(outputDir, "batch.csv", csv);

    const res = await client.batchGeocode(csv);
    const parsed = StatusResponseSchema.safeParse(res.data);
    const status = parsed.success ? parsed.data.status ?? "" : "";

    return succeeded("batchgeocode", res.status, res.status === 200 ? "" : status, res.data);
  },
};
