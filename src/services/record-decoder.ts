import {
  DatabaseCharset,
  LocationRecord,
  TimeZoneResolver,
} from "../models/geo-data";
import { CorruptDataError } from "../models/errors";
import { GeoDatabase, readUIntLE } from "./geo-database";
import { CountryTable } from "./country-table";

/** Upper bound on the bytes a single city record may span */
export const FULL_RECORD_LENGTH = 50;
const COORDINATE_SCALE = 10000;
const COORDINATE_OFFSET = 180;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;

/**
 * Decode a string field with the database charset.
 * Bytes that are not text in that charset become U+FFFD.
 */
export function decodeText(
  buffer: Buffer,
  start: number,
  end: number,
  charset: DatabaseCharset
): string {
  if (charset === "utf8") {
    return buffer.toString("utf8", start, end);
  }
  return buffer
    .toString("latin1", start, end)
    .replace(CONTROL_CHARACTERS, "\ufffd");
}

/**
 * Cursor over the bytes of one record, bounded by a window end
 */
class RecordReader {
  constructor(
    private readonly db: GeoDatabase,
    public position: number,
    private readonly windowEnd: number
  ) {}

  byte(): number {
    this.ensure(1, "country index");
    return this.db.buffer[this.position++];
  }

  uint24(field: string): number {
    this.ensure(3, field);
    const value = readUIntLE(this.db.buffer, this.position, 3);
    this.position += 3;
    return value;
  }

  /**
   * Read a NUL-terminated string; empty strings are null
   */
  string(field: string): string | null {
    const found = this.db.buffer
      .subarray(this.position, this.windowEnd)
      .indexOf(0);
    if (found === -1) {
      throw new CorruptDataError(
        this.position,
        `Unterminated ${field} field within ${FULL_RECORD_LENGTH} bytes`
      );
    }

    const start = this.position;
    const terminator = start + found;
    this.position = terminator + 1;
    return terminator > start
      ? decodeText(this.db.buffer, start, terminator, this.db.charset)
      : null;
  }

  private ensure(length: number, field: string): void {
    if (this.position + length > this.windowEnd) {
      throw new CorruptDataError(
        this.position,
        `Record ends before its ${field} field`
      );
    }
  }
}

function emptyRecord(): LocationRecord {
  return {
    country_code: null,
    country_code3: null,
    country_name: null,
    continent: null,
    region: null,
    city: null,
    postal_code: null,
    latitude: null,
    longitude: null,
    metro_code: null,
    area_code: null,
    time_zone: null,
  };
}

function coordinate(raw: number): number {
  return raw / COORDINATE_SCALE - COORDINATE_OFFSET;
}

/**
 * Turns a terminal trie pointer into a LocationRecord
 */
export class RecordDecoder {
  /**
   * Decode the record a terminal pointer refers to.
   * Returns null for the "no data" pointer.
   */
  static decode(
    db: GeoDatabase,
    pointer: number,
    timeZones?: TimeZoneResolver
  ): LocationRecord | null {
    if (pointer === db.segments) {
      return null;
    }

    const record =
      db.kind === "country"
        ? this.decodeCountry(db, pointer)
        : this.decodeCity(db, pointer);

    if (record && record.country_code && timeZones) {
      record.time_zone = timeZones.resolve(record.country_code, record.region);
    }

    return record ? Object.freeze(record) : null;
  }

  private static decodeCountry(
    db: GeoDatabase,
    pointer: number
  ): LocationRecord | null {
    const index = pointer - db.segments;
    const country = CountryTable.at(index);
    if (!country) {
      throw new CorruptDataError(pointer, `Unknown country index ${index}`);
    }
    if (!country.code) {
      return null;
    }

    return {
      ...emptyRecord(),
      country_code: country.code,
      country_code3: country.code3,
      country_name: country.name,
      continent: country.continent,
    };
  }

  private static decodeCity(db: GeoDatabase, pointer: number): LocationRecord {
    const recordStart = pointer + (2 * db.recordLength - 1) * db.segments;
    if (recordStart >= db.buffer.length) {
      throw new CorruptDataError(
        recordStart,
        "Record pointer lies outside the database"
      );
    }

    const reader = new RecordReader(
      db,
      recordStart,
      Math.min(recordStart + FULL_RECORD_LENGTH, db.buffer.length)
    );

    const countryIndex = reader.byte();
    const country = CountryTable.at(countryIndex);
    if (!country) {
      throw new CorruptDataError(
        recordStart,
        `Unknown country index ${countryIndex}`
      );
    }

    const record = emptyRecord();
    if (country.code) {
      record.country_code = country.code;
      record.country_code3 = country.code3;
      record.country_name = country.name;
      record.continent = country.continent;
    }

    record.region = reader.string("region");
    record.city = reader.string("city");
    record.postal_code = reader.string("postal code");
    record.latitude = coordinate(reader.uint24("latitude"));
    record.longitude = coordinate(reader.uint24("longitude"));

    // Only rev1 US records carry the combined metro/area code
    if (db.revision === 1 && record.country_code === "US") {
      const combo = reader.uint24("metro/area code");
      record.metro_code = Math.floor(combo / 1000);
      record.area_code = combo % 1000;
    }

    return record;
  }
}
