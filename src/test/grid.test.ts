import { cellKey, cellKeyFor, cellWindow, parseCellKey, quantize } from "../utils/grid";

const METERS_PER_DEGREE = 111_320;

function offsetMeters(lat: number, lon: number, north: number, east: number) {
  return {
    lat: lat + north / METERS_PER_DEGREE,
    lon: lon + east / (METERS_PER_DEGREE * Math.cos((lat * Math.PI) / 180)),
  };
}

describe("quantize", () => {
  test("rounds both axes to thousandths of a degree", () => {
    expect(quantize(52.5251, 13.3694)).toEqual({ latIdx: 52525, lonIdx: 13369 });
    expect(quantize(-33.8688, 151.2093)).toEqual({ latIdx: -33869, lonIdx: 151209 });
  });

  test("is deterministic", () => {
    expect(quantize(48.1402, 11.5586)).toEqual(quantize(48.1402, 11.5586));
    expect(cellKeyFor(48.1402, 11.5586)).toBe("48140:11559");
  });
});

describe("cellKey", () => {
  test("joins both indices with a colon", () => {
    expect(cellKey({ latIdx: -12346, lonIdx: 98765 })).toBe("-12346:98765");
  });

  test("parses a key back into its cell", () => {
    expect(parseCellKey("-12346:98765")).toEqual({ latIdx: -12346, lonIdx: 98765 });
    expect(parseCellKey(cellKeyFor(48.1402, 11.5586))).toEqual(quantize(48.1402, 11.5586));
  });

  test("rejects malformed keys", () => {
    for (const key of ["", "48140", "48140:", "48140:11559:1", "48.14:11559", "48140:11559x", "a:b"]) {
      expect(parseCellKey(key)).toBeNull();
    }
  });
});

describe("cellWindow", () => {
  test("covers a 7x7 block around the center cell", () => {
    const window = cellWindow(50.0001, 8.0001);
    expect(window).toHaveLength(49);
    expect(window[0]).toEqual({ latIdx: 49997, lonIdx: 7997 });
    expect(window[24]).toEqual({ latIdx: 50000, lonIdx: 8000 });
    expect(window[48]).toEqual({ latIdx: 50003, lonIdx: 8003 });
  });

  test("honours a custom radius", () => {
    expect(cellWindow(0, 0, 1)).toHaveLength(9);
  });

  test.each([-60, -30, 0, 30, 60])(
    "reaches 150 m in every direction at latitude %d",
    (lat) => {
      const lon = 10.4321;
      const keys = new Set(cellWindow(lat, lon).map(cellKey));

      for (const north of [-150, 0, 150]) {
        for (const east of [-150, 0, 150]) {
          const point = offsetMeters(lat, lon, north, east);
          expect(keys.has(cellKeyFor(point.lat, point.lon))).toBe(true);
        }
      }
    },
  );
});
