import { GeoIpConfig } from "../config/geoip-config";
import { LocationRecord, TimeZoneResolver } from "../models/geo-data";
import { GeoDatabase } from "./geo-database";
import { IpUtil } from "./ip-util";
import { RecordDecoder } from "./record-decoder";
import { TrieSearchUtil } from "./trie-search-util";
import { TimeZoneTable } from "./time-zone-table";
import { readDatabaseBytes, ReadOptions } from "./database-source";

/**
 * The pair of databases a lookup reads from; replaced as a whole
 */
export interface DatabaseSet {
  readonly v4: GeoDatabase | null;
  readonly v6: GeoDatabase | null;
}

export interface LookupServiceOptions {
  timeZones?: TimeZoneResolver;
}

export function createDatabaseSet(
  v4: GeoDatabase | null,
  v6: GeoDatabase | null = null
): DatabaseSet {
  return Object.freeze({ v4, v6 });
}

/**
 * Service for looking up IP geolocation data.
 *
 * Construct it once and hand it to whatever serves requests. Lookups are
 * synchronous and read the current DatabaseSet reference exactly once, so a
 * concurrent reload is observed either entirely or not at all.
 */
export class GeoIpLookupService {
  private databases: DatabaseSet;
  private generation = 0;
  private readonly timeZones?: TimeZoneResolver;

  constructor(databases: DatabaseSet, options: LookupServiceOptions = {}) {
    this.databases = databases;
    this.timeZones = options.timeZones;
  }

  /**
   * Load every configured database and the time zone table
   */
  static async fromConfig(
    config: GeoIpConfig,
    readOptions: ReadOptions = {}
  ): Promise<GeoIpLookupService> {
    const timeZones = config.timeZonesPath
      ? await TimeZoneTable.load(config.timeZonesPath)
      : undefined;

    return new GeoIpLookupService(await loadDatabaseSet(config, readOptions), {
      timeZones,
    });
  }

  /**
   * Look up geolocation data for an IP address given as text or octets.
   * Returns null when nothing is known about the address.
   */
  lookup(ip: string | Uint8Array): LocationRecord | null {
    const address = IpUtil.parse(ip);
    const { v4, v6 } = this.databases;
    const db = address.version === 4 ? v4 : v6;

    if (!db) {
      console.warn(
        `No IPv${address.version} database loaded, cannot look up ${IpUtil.format(address)}`
      );
      return null;
    }

    const pointer = TrieSearchUtil.seek(db, address);
    if (pointer === null) {
      return null;
    }

    return RecordDecoder.decode(db, pointer, this.timeZones);
  }

  /**
   * Replace the databases in a single assignment and return the previous set
   */
  swap(next: DatabaseSet): DatabaseSet {
    const previous = this.databases;
    this.databases = next;
    this.generation++;
    return previous;
  }

  /**
   * Build a new set with `load` and swap it in once it is complete.
   * A failing load leaves the current set untouched.
   */
  async reload(load: () => Promise<DatabaseSet>): Promise<DatabaseSet> {
    let next: DatabaseSet;
    try {
      next = await load();
    } catch (error) {
      console.error("Failed to reload GeoIP databases:", error);
      throw error;
    }

    const previous = this.swap(next);
    console.log(`GeoIP databases reloaded (generation ${this.generation})`);
    return previous;
  }

  getDatabases(): DatabaseSet {
    return this.databases;
  }

  getGeneration(): number {
    return this.generation;
  }
}

/**
 * Read and parse the databases named in the configuration
 */
export async function loadDatabaseSet(
  config: GeoIpConfig,
  readOptions: ReadOptions = {}
): Promise<DatabaseSet> {
  const options: ReadOptions = {
    timeoutMs: config.fetchTimeoutMs,
    ...readOptions,
  };

  const v4 = GeoDatabase.load(await readDatabaseBytes(config.ipv4, options), {
    charset: config.charset,
    ipVersion: 4,
  });
  console.log(
    `Loaded ${config.ipv4.name} (edition ${v4.edition}, ${v4.segments} segments)`
  );

  let v6: GeoDatabase | null = null;
  if (config.ipv6) {
    v6 = GeoDatabase.load(await readDatabaseBytes(config.ipv6, options), {
      charset: config.charset,
      ipVersion: 6,
    });
    console.log(
      `Loaded ${config.ipv6.name} (edition ${v6.edition}, ${v6.segments} segments)`
    );
  }

  return createDatabaseSet(v4, v6);
}
