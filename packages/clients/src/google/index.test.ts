import { describe, it, expect, vi, beforeEach } from "vitest";
import { createMapsClient, GeocodeResponseSchema, GeolocateResponseSchema } from "./index";
import type { HttpClient } from "../http";

const requestJson = vi.fn<HttpClient["requestJson"]>();
const requestBinary = vi.fn<HttpClient["requestBinary"]>();

function makeClient() {
  return createMapsClient({ apiKey: "test-key", http: { requestJson, requestBinary } });
}

beforeEach(() => {
  vi.clearAllMocks();
  requestJson.mockResolvedValue({ status: 200, data: {}, headers: {} });
  requestBinary.mockResolvedValue({ status: 200, bytes: new Uint8Array(0), headers: {} });
});

describe("createMapsClient", () => {
  it("geocodes an address with the key as a query parameter", async () => {
    await makeClient().geocode("1600 Amphitheatre Parkway");

    expect(requestJson).toHaveBeenCalledWith(
      "GET",
      "https://maps.googleapis.com/maps/api/geocode/json",
      { params: { address: "1600 Amphitheatre Parkway", key: "test-key" } }
    );
  });

  it("requests a 400x400 static map at zoom 7", async () => {
    await makeClient().staticMap("10,20");

    expect(requestBinary).toHaveBeenCalledWith(
      "GET",
      "https://maps.googleapis.com/maps/api/staticmap",
      { params: { center: "10,20", zoom: 7, size: "400x400", key: "test-key" } }
    );
  });

  it("searches nearby restaurants within 1000m", async () => {
    await makeClient().nearbySearch("10,20");

    expect(requestJson).toHaveBeenCalledWith(
      "GET",
      "https://maps.googleapis.com/maps/api/place/nearbysearch/json",
      { params: { location: "10,20", radius: 1000, type: "restaurant", key: "test-key" } }
    );
  });

  it("snaps an interpolated path on the roads host", async () => {
    await makeClient().snapToRoads("10,20|10,20");

    expect(requestJson).toHaveBeenCalledWith("GET", "https://roads.googleapis.com/v1/snapToRoads", {
      params: { path: "10,20|10,20", interpolate: true, key: "test-key" },
    });
  });

  it("posts considerIp to the geolocation API", async () => {
    await makeClient().geolocate();

    expect(requestJson).toHaveBeenCalledWith(
      "POST",
      "https://www.googleapis.com/geolocation/v1/geolocate",
      { params: { key: "test-key" }, json: { considerIp: true } }
    );
  });

  it("uploads the batch CSV as a multipart file", async () => {
    await makeClient().batchGeocode("address\r\nSome Place\r\n");

    const [method, url, options] = requestJson.mock.calls[0];
    expect(method).toBe("POST");
    expect(url).toBe("https://maps.googleapis.com/maps/api/geocode/batch/json");
    expect(options?.params).toEqual({ key: "test-key" });

    const file = options?.form?.get("file");
    expect(file).toBeInstanceOf(Blob);
    if (!(file instanceof Blob)) return;
    expect(await file.text()).toBe("address\r\nSome Place\r\n");
  });
});

describe("response shapes", () => {
  it("reads a geocode result and keeps unknown fields", () => {
    const parsed = GeocodeResponseSchema.safeParse({
      status: "OK",
      results: [
        {
          formatted_address: "Somewhere",
          geometry: { location: { lat: 1.5, lng: -2.25 }, location_type: "ROOFTOP" },
          place_id: "place-1",
          types: ["street_address"],
        },
      ],
    });

    expect(parsed.success).toBe(true);
    if (!parsed.success) return;
    expect(parsed.data.results[0].geometry.location).toEqual({ lat: 1.5, lng: -2.25 });
    expect(parsed.data.results[0].types).toEqual(["street_address"]);
  });

  it("defaults missing result lists to empty", () => {
    const parsed = GeocodeResponseSchema.safeParse({ status: "REQUEST_DENIED" });

    expect(parsed.success && parsed.data.results).toEqual([]);
  });

  it("accepts a geolocate error payload", () => {
    const parsed = GeolocateResponseSchema.safeParse({
      error: { code: 403, message: "denied" },
    });

    expect(parsed.success).toBe(true);
  });
});
