import {
  AutocompleteResponseSchema,
  FindPlaceResponseSchema,
  PlaceDetailsResponseSchema,
  PlaceListResponseSchema,
} from "@keycheck/clients";
import { parseBody } from "./parse";
import { noData, prerequisite, succeeded, type Probe } from "./types";

/** Runs only once geocode resolved a place, but searches by the raw place text. */
export const photoReferenceProbe: Probe = {
  endpoint: "photoreference",
  requires: ["placeId"],
  async run({ client }, ctx) {
    const res = await client.findPlacePhotos(ctx.place);
    const body = parseBody(FindPlaceResponseSchema, res);
    if (!body.ok) return body.attempt;

    const photos = body.data.candidates[0]?.photos;
    if (!photos || photos.length === 0) return noData(res.status, "no photos");

    return succeeded("photoreference", res.status, photos[0].photo_reference ?? "", res.data);
  },
};

export const placeDetailsProbe: Probe = {
  endpoint: "placedetails",
  requires: ["placeId"],
  async run({ client }, ctx) {
    const res = await client.placeDetails(prerequisite(ctx, "placeId"));
    const body = parseBody(PlaceDetailsResponseSchema, res);
    if (!body.ok) return body.attempt;
    if (body.data.status !== "OK") return noData(res.status, `status ${body.data.status}`);

    return succeeded("placedetails", res.status, body.data.result?.name ?? "", res.data);
  },
};

export const textSearchProbe: Probe = {
  endpoint: "textsearch",
  requires: [],
  async run({ client }, ctx) {
    const res = await client.textSearch(ctx.place);
    const body = parseBody(PlaceListResponseSchema, res);
    if (!body.ok) return body.attempt;

    const first = body.data.results[0];
    if (!first) return noData(res.status, "no results");
    return succeeded("textsearch", res.status, first.name ?? "", res.data);
  },
};

export const nearbySearchProbe: Probe = {
  endpoint: "nearbysearch",
  requires: ["coordinates"],
  async run({ client }, ctx) {
    const res = await client.nearbySearch(prerequisite(ctx, "coordinates"));
    const body = parseBody(PlaceListResponseSchema, res);
    if (!body.ok) return body.attempt;

    const first = body.data.results[0];
    if (!first) return noData(res.status, "no results");
    return succeeded("nearbysearch", res.status, first.name ?? "", res.data);
  },
};

/** Completes the first word of the place. */
export const autocompleteProbe: Probe = {
  endpoint: "autocomplete",
  requires: [],
  async run({ client }, ctx) {
    const prefix = ctx.place.trim().split(/\s+/)[0];
    const res = await client.autocomplete(prefix);
    const body = parseBody(AutocompleteResponseSchema, res);
    if (!body.ok) return body.attempt;

    const first = body.data.predictions[0];
    if (!first) return noData(res.status, "no predictions");
    return succeeded("autocomplete", res.status, first.description ?? "", res.data);
  },
};
