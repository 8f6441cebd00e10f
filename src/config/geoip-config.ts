import path from "path";
import dotenv from "dotenv";
import { DatabaseCharset, DatabaseSourceConfig } from "../models/geo-data";

// Load environment variables from .env
dotenv.config();

const DOWNLOAD_STUB = "https://geolite.maxmind.com/download/geoip/database";

export interface GeoIpConfig {
  ipv4: DatabaseSourceConfig;
  ipv6: DatabaseSourceConfig | null;
  charset: DatabaseCharset;
  timeZonesPath: string | null;
  fetchTimeoutMs: number;
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;

  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      throw new Error(`${name} must be a boolean, got "${value}"`);
  }
}

function parseCharset(value: string | undefined): DatabaseCharset {
  const charset = (value || "latin1").toLowerCase();
  if (charset === "latin1" || charset === "utf8") {
    return charset;
  }
  throw new Error(`GEOIP_CHARSET must be "latin1" or "utf8", got "${value}"`);
}

function parseTimeout(value: string | undefined): number {
  const timeout = parseInt(value || "30000", 10);
  if (isNaN(timeout) || timeout <= 0) {
    throw new Error(`GEOIP_FETCH_TIMEOUT_MS must be a positive integer, got "${value}"`);
  }
  return timeout;
}

/**
 * Build the GeoIP configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GeoIpConfig {
  const resolvePath = (file: string) => path.resolve(process.cwd(), file);

  const ipv4: DatabaseSourceConfig = {
    name: env.GEOIP_CITY_V4_NAME || "GeoLiteCity",
    path: resolvePath(env.GEOIP_CITY_V4_PATH || "vendor/GeoLiteCity.dat"),
    url: env.GEOIP_CITY_V4_URL || `${DOWNLOAD_STUB}/GeoLiteCity.dat.gz`,
  };

  const ipv6: DatabaseSourceConfig | null = parseBoolean(
    "GEOIP_ENABLE_V6",
    env.GEOIP_ENABLE_V6,
    true
  )
    ? {
        name: env.GEOIP_CITY_V6_NAME || "GeoLiteCityv6",
        path: resolvePath(env.GEOIP_CITY_V6_PATH || "vendor/GeoLiteCityv6.dat"),
        url:
          env.GEOIP_CITY_V6_URL ||
          `${DOWNLOAD_STUB}/GeoLiteCityv6-beta/GeoLiteCityv6.dat.gz`,
      }
    : null;

  // An explicitly empty value turns time zone resolution off
  const timeZonesPath =
    env.GEOIP_TIME_ZONES_PATH === ""
      ? null
      : resolvePath(env.GEOIP_TIME_ZONES_PATH || "data/time-zones.csv");

  return {
    ipv4,
    ipv6,
    charset: parseCharset(env.GEOIP_CHARSET),
    timeZonesPath,
    fetchTimeoutMs: parseTimeout(env.GEOIP_FETCH_TIMEOUT_MS),
  };
}
