import { batchGeocodeProbe, geocodeProbe } from "./geocoding";
import { staticMapProbe, streetViewProbe } from "./imagery";
import {
  autocompleteProbe,
  nearbySearchProbe,
  photoReferenceProbe,
  placeDetailsProbe,
  textSearchProbe,
} from "./places";
import { distanceMatrixProbe, elevationProbe, geolocateProbe, timeZoneProbe } from "./geo";
import { nearestRoadsProbe, snapToRoadsProbe } from "./roads";
import type { Probe } from "./types";

/** One probe per endpoint, in ENDPOINTS order. */
export const PROBES: readonly Probe[] = [
  geocodeProbe,
  batchGeocodeProbe,
  staticMapProbe,
  streetViewProbe,
  photoReferenceProbe,
  placeDetailsProbe,
  textSearchProbe,
  distanceMatrixProbe,
  elevationProbe,
  timeZoneProbe,
  nearbySearchProbe,
  autocompleteProbe,
  snapToRoadsProbe,
  nearestRoadsProbe,
  geolocateProbe,
];

export * from "./types";
