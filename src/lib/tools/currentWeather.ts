import { z } from "zod";
import { UpstreamUnavailableError } from "@/lib/errors";
import { fetchJson } from "@/lib/fetch";
import { assertCoordinates, round } from "@/lib/geo";
import type { WeatherClient, WeatherSnapshot } from "@/lib/types";

const SERVICE = "Weather service";

const CurrentWeatherSchema = z.object({
  main: z.object({
    temp: z.number(),
    humidity: z.number(),
  }),
  wind: z.object({ speed: z.number().optional() }).optional(),
  rain: z.object({ "1h": z.number().optional() }).optional(),
});

export type OpenWeatherOptions = { apiKey: string; baseUrl: string; timeoutMs: number };

/** OpenWeather "current weather data" endpoint, metric units. */
export class OpenWeatherClient implements WeatherClient {
  constructor(private readonly options: OpenWeatherOptions) {}

  async current(lat: number, lon: number): Promise<WeatherSnapshot> {
    assertCoordinates(lat, lon);

    const url = new URL("/data/2.5/weather", this.options.baseUrl);
    url.searchParams.set("lat", String(lat));
    url.searchParams.set("lon", String(lon));
    url.searchParams.set("units", "metric");
    url.searchParams.set("appid", this.options.apiKey);

    const json = await fetchJson(SERVICE, url, { timeoutMs: this.options.timeoutMs });
    const parsed = CurrentWeatherSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(SERVICE, "invalid weather payload (missing 'main' block)");
    }

    const j = parsed.data;
    return {
      temperature: round(j.main.temp),
      humidity: round(j.main.humidity),
      wind_speed: round(j.wind?.speed ?? 0),
      rainfall: round(j.rain?.["1h"] ?? 0),
    };
  }
}
