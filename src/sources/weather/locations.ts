/**
 * Locations file: one point per line, `Name = {latitud: <lat>, longitud: <lon>}`.
 */
import { readFile } from "node:fs/promises";

export interface Location {
  name: string;
  lat: number;
  lon: number;
}

const LOCATION_LINE =
  /(\w+)\s*=\s*\{\s*latitud:\s*([-\d.]+),\s*longitud:\s*([-\d.]+)\s*\}/;

/** Parse file contents; blank and non-matching lines are skipped. */
export function parseLocations(text: string): Location[] {
  const locations: Location[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const match = LOCATION_LINE.exec(line);
    if (!match) continue;
    const lat = Number(match[2]);
    const lon = Number(match[3]);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) continue;
    locations.push({ name: match[1], lat, lon });
  }
  return locations;
}

export async function loadLocations(path: string): Promise<Location[]> {
  return parseLocations(await readFile(path, "utf8"));
}
