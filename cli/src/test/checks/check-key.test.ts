import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../utils/logger", () => ({
  logger: {
    child: () => ({ debug: vi.fn(), info: vi.fn(), error: vi.fn() }),
  },
}));

import { checkKey } from "../../checks/check-key";
import { ENDPOINTS } from "../../probes";
import { outputDirFor } from "../../utils/output";
import { COORDINATES, GEOCODE_OK, binary, createFakeClient, json, type FakeClient } from "../fakes";

const API_KEY = "AIzaFAKEKEY1234567890";
const PLACE = "1600 Amphitheatre Parkway";
const NOW = new Date("2026-03-01T00:00:00Z");
const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

let client: FakeClient;
let outputRoot: string;
let outputDir: string;

function answerEverything(c: FakeClient) {
  c.geocode.mockResolvedValue(json(GEOCODE_OK));
  c.batchGeocode.mockResolvedValue(json({ status: "OK" }));
  c.staticMap.mockResolvedValue(
    binary(PNG, { "content-type": "image/png", "content-length": "20480" })
  );
  c.streetView.mockResolvedValue(
    binary(new Uint8Array([0xff, 0xd8]), { "content-type": "image/jpeg", "content-length": "1500" })
  );
  c.findPlacePhotos.mockResolvedValue(
    json({ candidates: [{ photos: [{ photo_reference: "photo-ref-1" }] }] })
  );
  c.placeDetails.mockResolvedValue(json({ status: "OK", result: { name: "Googleplex" } }));
  c.textSearch.mockResolvedValue(json({ results: [{ name: "Googleplex" }] }));
  c.distanceMatrix.mockResolvedValue(
    json({ rows: [{ elements: [{ distance: { text: "1 m" }, duration: { text: "1 min" } }] }] })
  );
  c.elevation.mockResolvedValue(json({ results: [{ elevation: 12.5 }] }));
  c.timeZone.mockResolvedValue(json({ timeZoneId: "America/Los_Angeles" }));
  c.nearbySearch.mockResolvedValue(json({ results: [{ name: "Cafe Test" }] }));
  c.autocomplete.mockResolvedValue(json({ predictions: [{ description: "1600 Main St" }] }));
  c.snapToRoads.mockResolvedValue(json({ snappedPoints: [{}, {}] }));
  c.nearestRoads.mockResolvedValue(json({ snappedPoints: [{}] }));
  c.geolocate.mockResolvedValue(json({ location: { lat: 51.5, lng: -0.12 } }));
}

beforeEach(() => {
  outputRoot = fs.mkdtempSync(path.join(os.tmpdir(), "keycheck-run-"));
  outputDir = outputDirFor(outputRoot, API_KEY);
  client = createFakeClient();
});

afterEach(() => {
  fs.rmSync(outputRoot, { recursive: true, force: true });
});

function run(onProgress?: Parameters<typeof checkKey>[0]["onProgress"]) {
  return checkKey({ client, apiKey: API_KEY, place: PLACE, outputDir, now: () => NOW, onProgress });
}

describe("checkKey", () => {
  it("reports every endpoint in declared order when all succeed", async () => {
    answerEverything(client);

    const { outcomes, context } = await run();

    expect([...outcomes.keys()]).toEqual([...ENDPOINTS]);
    expect(
      Object.fromEntries([...outcomes].map(([endpoint, outcome]) => [endpoint, outcome.info]))
    ).toEqual({
      geocode: "1600 Amphitheatre Pkwy, Mountain View, CA 94043, USA",
      batchgeocode: "",
      staticmap: "image/png, 20KB",
      streetview: "image/jpeg, 1KB",
      photoreference: "photo-ref-1",
      placedetails: "Googleplex",
      textsearch: "Googleplex",
      distancematrix: "1 m, 1 min",
      elevation: "12.5m",
      timezone: "America/Los_Angeles",
      nearbysearch: "Cafe Test",
      autocomplete: "1600 Main St",
      snaptoroads: "2 points",
      nearestroads: "1 points",
      geolocate: "51.5,-0.12",
    });
    expect(context).toEqual({
      apiKey: API_KEY,
      place: PLACE,
      formattedAddress: "1600 Amphitheatre Pkwy, Mountain View, CA 94043, USA",
      coordinates: COORDINATES,
      placeId: "place-test-1",
    });
  });

  it("feeds the geocoded coordinates and place id to every dependent probe", async () => {
    answerEverything(client);

    await run();

    expect(client.geocode).toHaveBeenCalledWith(PLACE);
    expect(client.staticMap).toHaveBeenCalledWith(COORDINATES);
    expect(client.streetView).toHaveBeenCalledWith(COORDINATES);
    expect(client.placeDetails).toHaveBeenCalledWith("place-test-1");
    expect(client.distanceMatrix).toHaveBeenCalledWith(COORDINATES, COORDINATES);
    expect(client.elevation).toHaveBeenCalledWith(COORDINATES);
    expect(client.timeZone).toHaveBeenCalledWith(COORDINATES, 1772323200);
    expect(client.nearbySearch).toHaveBeenCalledWith(COORDINATES);
    expect(client.snapToRoads).toHaveBeenCalledWith(`${COORDINATES}|${COORDINATES}`);
    expect(client.nearestRoads).toHaveBeenCalledWith(COORDINATES);
  });

  it("writes artifacts under the key's fingerprint directory", async () => {
    answerEverything(client);

    await run();

    const dir = path.join(outputRoot, "1b47227b");
    expect(Array.from(fs.readFileSync(path.join(dir, "staticmap.png")))).toEqual(Array.from(PNG));
    expect(fs.readFileSync(path.join(dir, "streetview.jpg")).length).toBe(2);
    expect(fs.readFileSync(path.join(dir, "batch.csv"), "utf8")).toBe(
      "address\r\n1600 Amphitheatre Parkway\r\n"
    );
  });

  it("skips dependent probes without a request when geocode is not OK", async () => {
    client.geocode.mockResolvedValue(json({ status: "REQUEST_DENIED", results: [] }));

    const { outcomes, results } = await run();

    for (const fn of [
      client.staticMap,
      client.streetView,
      client.findPlacePhotos,
      client.placeDetails,
      client.distanceMatrix,
      client.elevation,
      client.timeZone,
      client.nearbySearch,
      client.snapToRoads,
      client.nearestRoads,
    ]) {
      expect(fn).not.toHaveBeenCalled();
    }

    expect(results.filter((r) => r.status === "not-attempted")).toEqual([
      { status: "not-attempted", endpoint: "staticmap", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "streetview", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "photoreference", missing: ["placeId"] },
      { status: "not-attempted", endpoint: "placedetails", missing: ["placeId"] },
      { status: "not-attempted", endpoint: "distancematrix", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "elevation", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "timezone", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "nearbysearch", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "snaptoroads", missing: ["coordinates"] },
      { status: "not-attempted", endpoint: "nearestroads", missing: ["coordinates"] },
    ]);
    expect([...outcomes.keys()]).toEqual(["batchgeocode", "geolocate"]);
  });

  it("skips dependent probes when geocode fails at the transport level", async () => {
    client.geocode.mockResolvedValue(json({}, null));

    const { results, context } = await run();

    expect(results[0]).toEqual({
      status: "no-data",
      endpoint: "geocode",
      http: null,
      reason: "request failed",
    });
    expect(context.coordinates).toBeUndefined();
    expect(client.staticMap).not.toHaveBeenCalled();
  });

  it("distinguishes attempted-without-data from succeeded", async () => {
    answerEverything(client);
    client.textSearch.mockResolvedValue(json({ results: [], status: "ZERO_RESULTS" }));

    const { outcomes, results } = await run();

    expect(outcomes.has("textsearch")).toBe(false);
    expect(results.find((r) => r.endpoint === "textsearch")).toEqual({
      status: "no-data",
      endpoint: "textsearch",
      http: 200,
      reason: "no results",
    });
  });

  it("keeps going when a probe throws", async () => {
    answerEverything(client);
    client.staticMap.mockRejectedValue(new Error("disk full"));

    const { outcomes, results } = await run();

    expect(results.find((r) => r.endpoint === "staticmap")).toEqual({
      status: "no-data",
      endpoint: "staticmap",
      http: null,
      reason: "disk full",
    });
    expect(outcomes.size).toBe(14);
  });

  it("reports progress once per probe", async () => {
    const onProgress = vi.fn();

    await run(onProgress);

    expect(onProgress).toHaveBeenCalledTimes(15);
    expect(onProgress.mock.calls[0][0]).toEqual({ endpoint: "geocode", index: 0, total: 15 });
    expect(onProgress.mock.calls[14][0]).toEqual({ endpoint: "geolocate", index: 14, total: 15 });
  });
});
