import { bracketSamples, createIndexBuilder } from "../indexer/indexBuilder";
import { densifyShape } from "../indexer/shapeDensifier";
import { createStationResolver } from "../indexer/stationResolver";
import { DataIntegrityError } from "../utils/errors";
import { lookupIndex } from "./helpers";

const shape = [
  { lat: 50.0, lon: 8.0, distance: 100 },
  { lat: 50.0, lon: 8.1, distance: 250 },
  { lat: 50.0, lon: 8.2, distance: 400 },
];

const stops = [
  { stationName: "Alpha", distance: 100 },
  { stationName: "Beta (Ort)", distance: 250 },
  { stationName: "Gamma", distance: 400 },
];

const stationTable = new Map([
  ["Alpha", 1],
  ["Beta(Ort)", 2],
  ["Gamma", 3],
]);

describe("bracketSamples", () => {
  test("pairs each sample with the enclosing stops", () => {
    const samples = densifyShape(shape, 100);
    const brackets = bracketSamples("t1", samples, stops);

    expect(brackets.map(([from, to]) => `${from.stationName}-${to.stationName}`)).toEqual([
      "Alpha-Beta (Ort)",
      "Alpha-Beta (Ort)",
      "Alpha-Beta (Ort)",
      "Beta (Ort)-Gamma",
      "Beta (Ort)-Gamma",
    ]);
  });

  test("treats samples outside the stop range as a data integrity violation", () => {
    const late = [
      { stationName: "Alpha", distance: 150 },
      { stationName: "Gamma", distance: 400 },
    ];
    expect(() => bracketSamples("t1", shape, late)).toThrow(DataIntegrityError);
    expect(() => bracketSamples("t1", shape, late)).toThrow(
      "Trip t1: shape sample at 100 lies outside its stops (150..400)",
    );
  });
});

describe("createIndexBuilder", () => {
  test("recovers the bracketing station pair at every densified sample", () => {
    const builder = createIndexBuilder({
      spacingMeters: 100,
      resolver: createStationResolver(stationTable),
    });
    builder.addTrip("t1", shape, stops);
    const index = builder.build();

    for (const sample of densifyShape(shape, 100)) {
      const expected = sample.distance <= 250 ? [1, 2] : [2, 3];
      const found = Array.from(lookupIndex(index, sample.lat, sample.lon));
      expect(found.sort((a, b) => a - b)).toEqual(expected);
    }

    expect(builder.stats()).toEqual({
      trips: 1,
      skippedTrips: 0,
      samples: 5,
      polylineLegs: 0,
      cells: 5,
      unresolvedNames: 0,
    });
  });

  test("drops unresolvable station names", () => {
    const builder = createIndexBuilder({
      spacingMeters: 100,
      resolver: createStationResolver(new Map([["Alpha", 1]])),
    });
    builder.addTrip("t1", shape, stops);

    const index = builder.build();
    expect(index.get("50000:8000")).toEqual(new Set([1]));
    expect(index.has("50000:8200")).toBe(false);
    expect(builder.stats().unresolvedNames).toBe(2);
  });

  test("skips trips with fewer than two stops", () => {
    const builder = createIndexBuilder({
      spacingMeters: 100,
      resolver: createStationResolver(stationTable),
    });
    builder.addTrip("t1", shape, [stops[0]]);

    expect(builder.build().size).toBe(0);
    expect(builder.stats().skippedTrips).toBe(1);
  });

  test("aborts on shapes that run past the last stop", () => {
    const builder = createIndexBuilder({
      spacingMeters: 100,
      resolver: createStationResolver(stationTable),
    });
    expect(() => builder.addTrip("t1", shape, stops.slice(0, 2))).toThrow(DataIntegrityError);
  });

  test("registers both boundary stations along live polylines", () => {
    const builder = createIndexBuilder({
      spacingMeters: 100,
      resolver: createStationResolver(stationTable),
    });
    builder.addPolyline([
      { lat: 51.0, lon: 9.0, stationId: 2001 },
      { lat: 51.0, lon: 9.005, stationId: null },
      { lat: 51.0, lon: 9.01, stationId: 2002 },
      { lat: 51.0, lon: 9.02, stationId: null },
    ]);

    const index = builder.build();
    expect(index.get("51000:9000")).toEqual(new Set([2001, 2002]));
    expect(index.get("51000:9010")).toEqual(new Set([2001, 2002]));
    expect(index.has("51000:9020")).toBe(false);
    expect(builder.stats().polylineLegs).toBe(1);
  });
});
