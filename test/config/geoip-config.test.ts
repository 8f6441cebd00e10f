import path from "path";
import { loadConfig } from "../../src/config/geoip-config";

describe("loadConfig", () => {
  const fromCwd = (file: string) => path.resolve(process.cwd(), file);

  test("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual({
      ipv4: {
        name: "GeoLiteCity",
        path: fromCwd("vendor/GeoLiteCity.dat"),
        url: "https://geolite.maxmind.com/download/geoip/database/GeoLiteCity.dat.gz",
      },
      ipv6: {
        name: "GeoLiteCityv6",
        path: fromCwd("vendor/GeoLiteCityv6.dat"),
        url: "https://geolite.maxmind.com/download/geoip/database/GeoLiteCityv6-beta/GeoLiteCityv6.dat.gz",
      },
      charset: "latin1",
      timeZonesPath: fromCwd("data/time-zones.csv"),
      fetchTimeoutMs: 30000,
    });
  });

  test("should read overrides from the environment", () => {
    const config = loadConfig({
      GEOIP_CITY_V4_NAME: "CityV4",
      GEOIP_CITY_V4_PATH: "/srv/geoip/city.dat",
      GEOIP_CITY_V4_URL: "https://mirror.test/city.dat",
      GEOIP_CITY_V6_PATH: "db/city6.dat",
      GEOIP_CHARSET: "UTF8",
      GEOIP_TIME_ZONES_PATH: "config/zones.csv",
      GEOIP_FETCH_TIMEOUT_MS: "5000",
    });

    expect(config.ipv4).toEqual({
      name: "CityV4",
      path: "/srv/geoip/city.dat",
      url: "https://mirror.test/city.dat",
    });
    expect(config.ipv6?.path).toBe(fromCwd("db/city6.dat"));
    expect(config.charset).toBe("utf8");
    expect(config.timeZonesPath).toBe(fromCwd("config/zones.csv"));
    expect(config.fetchTimeoutMs).toBe(5000);
  });

  test.each(["0", "false", "No", "off"])("should drop IPv6 for GEOIP_ENABLE_V6=%s", (value) => {
    expect(loadConfig({ GEOIP_ENABLE_V6: value }).ipv6).toBeNull();
  });

  test("should turn time zones off for an empty path", () => {
    expect(loadConfig({ GEOIP_TIME_ZONES_PATH: "" }).timeZonesPath).toBeNull();
  });

  test("should reject invalid values", () => {
    expect(() => loadConfig({ GEOIP_ENABLE_V6: "maybe" })).toThrow(
      'GEOIP_ENABLE_V6 must be a boolean, got "maybe"'
    );
    expect(() => loadConfig({ GEOIP_CHARSET: "ascii" })).toThrow(
      'GEOIP_CHARSET must be "latin1" or "utf8", got "ascii"'
    );
    expect(() => loadConfig({ GEOIP_FETCH_TIMEOUT_MS: "0" })).toThrow(
      'GEOIP_FETCH_TIMEOUT_MS must be a positive integer, got "0"'
    );
    expect(() => loadConfig({ GEOIP_FETCH_TIMEOUT_MS: "soon" })).toThrow(
      "GEOIP_FETCH_TIMEOUT_MS must be a positive integer"
    );
  });
});
