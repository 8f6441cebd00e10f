import { DatabaseCharset, IpVersion } from "../models/geo-data";
import { FormatError } from "../models/errors";

/**
 * Edition ids written after the structure marker of a legacy database
 */
export const DatabaseEdition = {
  COUNTRY: 1,
  CITY_REV1: 2,
  CITY_REV0: 6,
  COUNTRY_V6: 12,
  CITY_REV1_V6: 30,
  CITY_REV0_V6: 31,
} as const;

export type DatabaseEditionId =
  (typeof DatabaseEdition)[keyof typeof DatabaseEdition];

export type DatabaseKind = "country" | "city";

interface EditionInfo {
  kind: DatabaseKind;
  ipVersion: IpVersion;
  revision: 0 | 1;
}

const EDITIONS: Record<DatabaseEditionId, EditionInfo> = {
  [DatabaseEdition.COUNTRY]: { kind: "country", ipVersion: 4, revision: 0 },
  [DatabaseEdition.CITY_REV1]: { kind: "city", ipVersion: 4, revision: 1 },
  [DatabaseEdition.CITY_REV0]: { kind: "city", ipVersion: 4, revision: 0 },
  [DatabaseEdition.COUNTRY_V6]: { kind: "country", ipVersion: 6, revision: 0 },
  [DatabaseEdition.CITY_REV1_V6]: { kind: "city", ipVersion: 6, revision: 1 },
  [DatabaseEdition.CITY_REV0_V6]: { kind: "city", ipVersion: 6, revision: 0 },
};

/** Pointer threshold of country editions; pointers at or above it are terminal */
export const COUNTRY_BEGIN = 16776960;
export const STANDARD_RECORD_LENGTH = 3;
export const SEGMENT_RECORD_LENGTH = 3;
export const STRUCTURE_INFO_MAX_SIZE = 20;
/** Editions written before April 2003 carry their id offset by this much */
const LEGACY_EDITION_OFFSET = 105;
const STRUCTURE_MARKER = 0xff;

export interface LoadOptions {
  charset?: DatabaseCharset;
  /** Family the caller expects; a database of the other family is rejected */
  ipVersion?: IpVersion;
}

function isKnownEdition(edition: number): edition is DatabaseEditionId {
  return Object.prototype.hasOwnProperty.call(EDITIONS, edition);
}

/**
 * Read a little-endian unsigned integer of `length` bytes
 */
export function readUIntLE(
  buffer: Buffer,
  offset: number,
  length: number
): number {
  let value = 0;
  for (let j = 0; j < length; j++) {
    value += buffer[offset + j] * 2 ** (j * 8);
  }
  return value;
}

/**
 * An immutable, parsed legacy GeoIP database.
 * Wraps the caller's bytes without copying them.
 */
export class GeoDatabase {
  readonly buffer: Buffer;
  readonly edition: DatabaseEditionId;
  readonly kind: DatabaseKind;
  readonly revision: 0 | 1;
  readonly ipVersion: IpVersion;
  readonly addressBits: 32 | 128;
  readonly recordLength: number;
  /** Node count for city editions, pointer threshold for country editions */
  readonly segments: number;
  readonly charset: DatabaseCharset;

  private constructor(
    buffer: Buffer,
    edition: DatabaseEditionId,
    segments: number,
    charset: DatabaseCharset
  ) {
    const info = EDITIONS[edition];
    this.buffer = buffer;
    this.edition = edition;
    this.kind = info.kind;
    this.revision = info.revision;
    this.ipVersion = info.ipVersion;
    this.addressBits = info.ipVersion === 4 ? 32 : 128;
    this.recordLength = STANDARD_RECORD_LENGTH;
    this.segments = segments;
    this.charset = charset;
    Object.freeze(this);
  }

  /**
   * Validate `bytes` and build a database over them
   */
  static load(bytes: Uint8Array, options: LoadOptions = {}): GeoDatabase {
    const buffer = Buffer.isBuffer(bytes)
      ? bytes
      : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    const minimumSize = 2 * STANDARD_RECORD_LENGTH;
    if (buffer.length < minimumSize) {
      throw new FormatError(
        "truncated",
        `database has ${buffer.length} bytes, at least ${minimumSize} are required`
      );
    }

    const { edition, segments } = this.readStructureInfo(buffer);
    const info = EDITIONS[edition];

    if (options.ipVersion && options.ipVersion !== info.ipVersion) {
      throw new FormatError(
        "wrong-family",
        `edition ${edition} holds IPv${info.ipVersion} data, IPv${options.ipVersion} was expected`
      );
    }

    if (info.kind === "city") {
      if (segments === 0) {
        throw new FormatError(
          "invalid-structure",
          "city database declares no segments"
        );
      }

      const nodeBytes = segments * 2 * STANDARD_RECORD_LENGTH;
      if (nodeBytes > buffer.length) {
        throw new FormatError(
          "truncated",
          `${segments} segments need ${nodeBytes} bytes, buffer has ${buffer.length}`
        );
      }
    }

    return new GeoDatabase(
      buffer,
      edition,
      segments,
      options.charset ?? "latin1"
    );
  }

  /**
   * Scan backwards from the end of the buffer for the FF FF FF marker.
   * Without a marker the buffer is a plain IPv4 country database.
   */
  private static readStructureInfo(buffer: Buffer): {
    edition: DatabaseEditionId;
    segments: number;
  } {
    let position = buffer.length - 3;

    for (let i = 0; i < STRUCTURE_INFO_MAX_SIZE && position >= 0; i++, position--) {
      if (
        buffer[position] !== STRUCTURE_MARKER ||
        buffer[position + 1] !== STRUCTURE_MARKER ||
        buffer[position + 2] !== STRUCTURE_MARKER
      ) {
        continue;
      }

      const editionOffset = position + 3;
      if (editionOffset >= buffer.length) {
        throw new FormatError("truncated", "structure marker has no edition byte");
      }

      let edition = buffer[editionOffset];
      if (edition >= LEGACY_EDITION_OFFSET + 1) {
        edition -= LEGACY_EDITION_OFFSET;
      }

      if (!isKnownEdition(edition)) {
        throw new FormatError(
          "unsupported-edition",
          `edition ${edition} is not a country or city database`
        );
      }

      if (EDITIONS[edition].kind === "country") {
        return { edition, segments: COUNTRY_BEGIN };
      }

      const segmentsOffset = editionOffset + 1;
      if (segmentsOffset + SEGMENT_RECORD_LENGTH > buffer.length) {
        throw new FormatError(
          "truncated",
          "structure info ends before the segment count"
        );
      }

      return {
        edition,
        segments: readUIntLE(buffer, segmentsOffset, SEGMENT_RECORD_LENGTH),
      };
    }

    return { edition: DatabaseEdition.COUNTRY, segments: COUNTRY_BEGIN };
  }
}
