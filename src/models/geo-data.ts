/**
 * A parsed IP address, ready for trie traversal
 */
export type IpAddress =
  | { version: 4; value: number }
  | { version: 6; value: bigint };

export type IpVersion = IpAddress["version"];

/**
 * Character set used to decode the string fields of a database record
 */
export type DatabaseCharset = "latin1" | "utf8";

/**
 * Interface representing the result of a geolocation lookup.
 * Keys follow the external contract, absent values are always null.
 */
export interface LocationRecord {
  country_code: string | null;
  country_code3: string | null;
  country_name: string | null;
  continent: string | null;
  region: string | null;
  city: string | null;
  postal_code: string | null;
  latitude: number | null;
  longitude: number | null;
  metro_code: number | null;
  area_code: number | null;
  time_zone: string | null;
}

/**
 * Interface for an entry of the legacy country table
 */
export interface CountryEntry {
  code: string;
  code3: string;
  name: string;
  continent: string;
}

/**
 * Anything that can map a country/region pair to an IANA time zone
 */
export interface TimeZoneResolver {
  resolve(countryCode: string, region: string | null): string | null;
}

/**
 * Where the raw bytes of one database come from
 */
export interface DatabaseSourceConfig {
  name: string;
  path: string;
  url: string;
}
