import type { GridCell } from "../types";

export const GRID_RESOLUTION = 1000;
export const DEFAULT_WINDOW_CELLS = 3;

/**
 * Maps a coordinate to its grid cell. One latitude step is roughly 111 m;
 * the longitude step narrows towards the poles and is left uncorrected.
 */
export function quantize(lat: number, lon: number): GridCell {
  return {
    latIdx: Math.round(lat * GRID_RESOLUTION),
    lonIdx: Math.round(lon * GRID_RESOLUTION),
  };
}

export function cellKey(cell: GridCell): string {
  return `${cell.latIdx}:${cell.lonIdx}`;
}

const CELL_KEY = /^(-?\d+):(-?\d+)$/;

export function parseCellKey(key: string): GridCell | null {
  const match = CELL_KEY.exec(key);
  if (!match) return null;
  return { latIdx: Number(match[1]), lonIdx: Number(match[2]) };
}

export function cellKeyFor(lat: number, lon: number): string {
  return cellKey(quantize(lat, lon));
}

export function cellWindow(
  lat: number,
  lon: number,
  radius = DEFAULT_WINDOW_CELLS,
): GridCell[] {
  const center = quantize(lat, lon);
  const cells: GridCell[] = [];

  for (let dLat = -radius; dLat <= radius; dLat += 1) {
    for (let dLon = -radius; dLon <= radius; dLon += 1) {
      cells.push({
        latIdx: center.latIdx + dLat,
        lonIdx: center.lonIdx + dLon,
      });
    }
  }

  return cells;
}
