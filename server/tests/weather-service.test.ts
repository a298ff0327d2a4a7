import { describe, it, expect, vi } from "vitest";
import { OpenMeteoWeather, buildWeatherUrl } from "../weather-service";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("OpenMeteoWeather", () => {
  it("builds the current-conditions query", () => {
    expect(buildWeatherUrl("https://weather.test/v1/forecast", 37.5, -122.25)).toBe(
      "https://weather.test/v1/forecast?latitude=37.5&longitude=-122.25&current=temperature_2m%2Capparent_temperature%2Cweather_code"
    );
  });

  it("reads temperature and feels-like", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({ current: { temperature_2m: 12.4, apparent_temperature: 9.8, weather_code: 3 } })
    );
    const weather = new OpenMeteoWeather({ baseUrl: "https://weather.test/v1/forecast", fetch: fetchMock });

    expect(await weather.current(37.5, -122.25)).toEqual({ temperatureC: 12.4, apparentTemperatureC: 9.8 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("returns null on an error status", async () => {
    const weather = new OpenMeteoWeather({ fetch: vi.fn(async () => jsonResponse({ reason: "bad" }, 400)) });
    expect(await weather.current(0, 0)).toBeNull();
  });

  it("returns null when the request fails", async () => {
    const weather = new OpenMeteoWeather({
      fetch: vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    });
    expect(await weather.current(0, 0)).toBeNull();
  });

  it("returns null without a current block", async () => {
    const weather = new OpenMeteoWeather({ fetch: vi.fn(async () => jsonResponse({ hourly: {} })) });
    expect(await weather.current(0, 0)).toBeNull();
  });
});
