import { z } from "zod";
import { describeError } from "@/lib/errors";
import { fetchJson } from "@/lib/fetch";
import { coordinateLabel } from "@/lib/geo";
import type { Geocoder } from "@/lib/types";

const NominatimReverseSchema = z.object({
  display_name: z.string().optional(),
  address: z.record(z.string()).optional(),
});

type NominatimReverse = z.infer<typeof NominatimReverseSchema>;

const PLACE_KEYS = ["city", "town", "village", "municipality", "county"] as const;

export function pickPlaceName(reverse: NominatimReverse) {
  const address = reverse.address ?? {};
  const place = PLACE_KEYS.map((k) => address[k]).find((v) => typeof v === "string" && v.trim()) ?? null;

  if (place) {
    return [place, address.state, address.country].filter((v): v is string => Boolean(v)).join(", ");
  }

  const display = reverse.display_name?.split(",")[0]?.trim();
  return display || null;
}

export type NominatimOptions = { baseUrl: string; userAgent: string; timeoutMs: number };

export class NominatimGeocoder implements Geocoder {
  constructor(private readonly options: NominatimOptions) {}

  async placeName(lat: number, lon: number): Promise<string> {
    const url = new URL("/reverse", this.options.baseUrl);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("lat", String(lat));
    url.searchParams.set("lon", String(lon));
    url.searchParams.set("zoom", "10");
    url.searchParams.set("addressdetails", "1");

    try {
      const json = await fetchJson("Geocoding service", url, {
        timeoutMs: this.options.timeoutMs,
        headers: { "User-Agent": this.options.userAgent },
      });
      const parsed = NominatimReverseSchema.safeParse(json);
      const name = parsed.success ? pickPlaceName(parsed.data) : null;
      if (name) return name;
      console.warn(`[geocode] no place name for ${lat},${lon}; using coordinates`);
    } catch (e) {
      console.warn(`[geocode] reverse lookup failed for ${lat},${lon}: ${describeError(e)}`);
    }

    return coordinateLabel(lat, lon);
  }
}
