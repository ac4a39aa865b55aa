import { z } from "zod";
import type { CapabilityFn } from "../orchestrator/capabilities";
import { missingKey, requestJson, type HttpOptions } from "./http";

const WEATHER_URL = "https://api.openweathermap.org/data/2.5/weather";

const weatherSchema = z.object({
  main: z.object({ temp: z.number(), humidity: z.number() }),
  weather: z.array(z.object({ description: z.string() })).default([]),
});

export interface WeatherOptions extends HttpOptions {
  apiKey?: string;
}

/** Current conditions from OpenWeather, in metric units. */
export function createWeatherClient(options: WeatherOptions): CapabilityFn<"get_weather"> {
  return async ({ location }) => {
    if (!options.apiKey) return missingKey("OpenWeather");
    const url = new URL(WEATHER_URL);
    url.searchParams.set("q", location);
    url.searchParams.set("appid", options.apiKey);
    url.searchParams.set("units", "metric");

    const res = await requestJson(
      "OpenWeather",
      url.toString(),
      { method: "GET" },
      weatherSchema,
      options.fetch,
    );
    if (!res.ok) return res;
    return {
      ok: true,
      data: {
        temperature: res.data.main.temp,
        humidity: res.data.main.humidity,
        description: res.data.weather[0]?.description ?? "unknown",
      },
    };
  };
}
