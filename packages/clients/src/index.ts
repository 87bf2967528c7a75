export { createHttpClient, buildUrl } from "./http";
export type { HttpClient, HttpClientConfig, RequestOptions } from "./http";

export {
  createMapsClient,
  GeocodeResponseSchema,
  StatusResponseSchema,
  FindPlaceResponseSchema,
  PlaceDetailsResponseSchema,
  PlaceListResponseSchema,
  DistanceMatrixResponseSchema,
  ElevationResponseSchema,
  TimeZoneResponseSchema,
  AutocompleteResponseSchema,
  SnappedPointsResponseSchema,
  GeolocateResponseSchema,
} from "./google/index";
export type { MapsClient, MapsClientConfig, GeocodeResponse } from "./google/index";

export { createFetch } from "./proxy";
export type { FetchFn, ProxyConfig } from "./proxy";

export { describeError } from "./errors";
export type { ErrorDescription } from "./errors";

export type {
  HttpMethod,
  QueryParams,
  JsonResponse,
  BinaryResponse,
  HttpLogger,
} from "./types";
