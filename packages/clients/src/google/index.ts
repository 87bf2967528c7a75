import { z } from "zod";
import type { HttpClient } from "../http";
import type { BinaryResponse, JsonResponse, QueryParams } from "../types";

const MAPS_API = "https://maps.googleapis.com/maps/api";
const ROADS_API = "https://roads.googleapis.com/v1";
const GEOLOCATION_API = "https://www.googleapis.com/geolocation/v1";

// ── Response shapes ──────────────────────────────────────────────
// Only the fields the key check reads. Everything else passes through.

const LatLngSchema = z.object({ lat: z.number(), lng: z.number() }).passthrough();

export const GeocodeResponseSchema = z
  .object({
    status: z.string(),
    results: z
      .array(
        z
          .object({
            formatted_address: z.string(),
            geometry: z.object({ location: LatLngSchema }).passthrough(),
            place_id: z.string(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const StatusResponseSchema = z
  .object({ status: z.string().optional() })
  .passthrough();

export const FindPlaceResponseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            photos: z
              .array(z.object({ photo_reference: z.string().optional() }).passthrough())
              .optional(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const PlaceDetailsResponseSchema = z
  .object({
    status: z.string(),
    result: z.object({ name: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const PlaceListResponseSchema = z
  .object({
    results: z
      .array(z.object({ name: z.string().optional() }).passthrough())
      .default([]),
  })
  .passthrough();

const TextValueSchema = z.object({ text: z.string() }).passthrough();

export const DistanceMatrixResponseSchema = z
  .object({
    rows: z
      .array(
        z
          .object({
            elements: z
              .array(
                z
                  .object({
                    distance: TextValueSchema.optional(),
                    duration: TextValueSchema.optional(),
                  })
                  .passthrough()
              )
              .default([]),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const ElevationResponseSchema = z
  .object({
    results: z
      .array(z.object({ elevation: z.number().optional() }).passthrough())
      .default([]),
  })
  .passthrough();

export const TimeZoneResponseSchema = z
  .object({ timeZoneId: z.string().optional() })
  .passthrough();

export const AutocompleteResponseSchema = z
  .object({
    predictions: z
      .array(z.object({ description: z.string().optional() }).passthrough())
      .default([]),
  })
  .passthrough();

export const SnappedPointsResponseSchema = z
  .object({ snappedPoints: z.array(z.unknown()).default([]) })
  .passthrough();

export const GeolocateResponseSchema = z
  .object({
    location: z
      .object({ lat: z.number().nullable().optional(), lng: z.number().nullable().optional() })
      .passthrough()
      .optional(),
    error: z.unknown().optional(),
    status: z.unknown().optional(),
  })
  .passthrough();

export type GeocodeResponse = z.infer<typeof GeocodeResponseSchema>;

// ── Client ───────────────────────────────────────────────────────

export interface MapsClientConfig {
  apiKey: string;
  http: HttpClient;
}

export function createMapsClient(config: MapsClientConfig) {
  const { apiKey, http } = config;

  function withKey(params: QueryParams = {}): QueryParams {
    return { ...params, key: apiKey };
  }

  function getJson(url: string, params: QueryParams): Promise<JsonResponse> {
    return http.requestJson("GET", url, { params: withKey(params) });
  }

  function getBinary(url: string, params: QueryParams): Promise<BinaryResponse> {
    return http.requestBinary("GET", url, { params: withKey(params) });
  }

  async function geocode(address: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/geocode/json`, { address });
  }

  /** Uploads a CSV (header row "address") to the batch geocoding endpoint. */
  async function batchGeocode(csv: string): Promise<JsonResponse> {
    const form = new FormData();
    form.append("file", new Blob([csv], { type: "text/csv" }), "batch.csv");
    return http.requestJson("POST", `${MAPS_API}/geocode/batch/json`, {
      params: withKey(),
      form,
    });
  }

  async function staticMap(center: string): Promise<BinaryResponse> {
    return getBinary(`${MAPS_API}/staticmap`, { center, zoom: 7, size: "400x400" });
  }

  async function streetView(location: string): Promise<BinaryResponse> {
    return getBinary(`${MAPS_API}/streetview`, { location, size: "400x400" });
  }

  async function findPlacePhotos(input: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/place/findplacefromtext/json`, {
      input,
      inputtype: "textquery",
      fields: "photos",
    });
  }

  async function placeDetails(placeId: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/place/details/json`, { place_id: placeId });
  }

  async function textSearch(query: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/place/textsearch/json`, { query });
  }

  async function distanceMatrix(origins: string, destinations: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/distancematrix/json`, { origins, destinations });
  }

  async function elevation(locations: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/elevation/json`, { locations });
  }

  /** `timestamp` is in unix seconds. */
  async function timeZone(location: string, timestamp: number): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/timezone/json`, { location, timestamp });
  }

  async function nearbySearch(location: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/place/nearbysearch/json`, {
      location,
      radius: 1000,
      type: "restaurant",
    });
  }

  async function autocomplete(input: string): Promise<JsonResponse> {
    return getJson(`${MAPS_API}/place/autocomplete/json`, { input, types: "geocode" });
  }

  /** `path` is a pipe-separated list of "lat,lng" points. */
  async function snapToRoads(path: string): Promise<JsonResponse> {
    return getJson(`${ROADS_API}/snapToRoads`, { path, interpolate: true });
  }

  async function nearestRoads(points: string): Promise<JsonResponse> {
    return getJson(`${ROADS_API}/nearestRoads`, { points });
  }

  async function geolocate(): Promise<JsonResponse> {
    return http.requestJson("POST", `${GEOLOCATION_API}/geolocate`, {
      params: withKey(),
      json: { considerIp: true },
    });
  }

  return {
    geocode,
    batchGeocode,
    staticMap,
    streetView,
    findPlacePhotos,
    placeDetails,
    textSearch,
    distanceMatrix,
    elevation,
    timeZone,
    nearbySearch,
    autocomplete,
    snapToRoads,
    nearestRoads,
    geolocate,
  };
}

export type MapsClient = ReturnType<typeof createMapsClient>;
