export { GeoDatabase, DatabaseEdition, COUNTRY_BEGIN } from "./services/geo-database";
export type { DatabaseEditionId, DatabaseKind, LoadOptions } from "./services/geo-database";
export { TrieSearchUtil } from "./services/trie-search-util";
export { RecordDecoder, FULL_RECORD_LENGTH } from "./services/record-decoder";
export {
  GeoIpLookupService,
  createDatabaseSet,
  loadDatabaseSet,
} from "./services/geoip-lookup-service";
export type {
  DatabaseSet,
  LookupServiceOptions,
} from "./services/geoip-lookup-service";
export { readDatabaseBytes } from "./services/database-source";
export type { FetchLike, ReadOptions } from "./services/database-source";
export { IpUtil } from "./services/ip-util";
export { Ipv6Util } from "./services/ipv6-util";
export { CountryTable } from "./services/country-table";
export { TimeZoneTable } from "./services/time-zone-table";
export { loadConfig } from "./config/geoip-config";
export type { GeoIpConfig } from "./config/geoip-config";
export {
  GeoIpError,
  FormatError,
  CorruptDataError,
  InvalidInputError,
} from "./models/errors";
export type { FormatErrorReason } from "./models/errors";
export type {
  IpAddress,
  IpVersion,
  LocationRecord,
  CountryEntry,
  TimeZoneResolver,
  DatabaseCharset,
  DatabaseSourceConfig,
} from "./models/geo-data";
