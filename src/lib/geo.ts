import { InvalidInputError } from "@/lib/errors";
import type { Coordinates } from "@/lib/types";

export function isValidCoordinate(lat: number, lon: number) {
  return Number.isFinite(lat) && Number.isFinite(lon) && lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
}

export function assertCoordinates(lat: number, lon: number) {
  if (!isValidCoordinate(lat, lon)) {
    throw new InvalidInputError("Invalid coordinates. Latitude must be -90 to 90, longitude -180 to 180.");
  }
}

/** Parses the dashboard's `"<lat>,<lon>"` location string. */
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function parseLocation(raw: string): Coordinates {
  const parts = raw.split(",").map((p) => p.trim());
  if (parts.length !== 2 || parts.some((p) => !DECIMAL.test(p))) {
    throw new InvalidInputError("Invalid location format. Use 'lat,lon'.");
  }

  const lat = Number(parts[0]);
  const lon = Number(parts[1]);
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new InvalidInputError("Invalid location format. Use 'lat,lon'.");
  }

  assertCoordinates(lat, lon);
  return { lat, lon };
}

export function coordinateLabel(lat: number, lon: number) {
  return `Location ${lat.toFixed(3)}, ${lon.toFixed(3)}`;
}

export function round(value: number, digits = 1) {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
