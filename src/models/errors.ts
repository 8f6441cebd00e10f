/**
 * Base class for every error raised by the GeoIP decoder
 */
export class GeoIpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type FormatErrorReason =
  | "truncated"
  | "unsupported-edition"
  | "invalid-structure"
  | "wrong-family";

/**
 * Raised by the loader when a buffer is not a usable database.
 * The database is never constructed.
 */
export class FormatError extends GeoIpError {
  readonly reason: FormatErrorReason;

  constructor(reason: FormatErrorReason, detail: string) {
    super(`${reason}: ${detail}`);
    this.reason = reason;
  }
}

/**
 * Raised by a lookup that reaches data it cannot decode.
 * The database stays usable for other lookups.
 */
export class CorruptDataError extends GeoIpError {
  readonly offset: number;

  constructor(offset: number, detail: string) {
    super(`${detail} (offset ${offset})`);
    this.offset = offset;
  }
}

/**
 * Raised before traversal when the address cannot be parsed
 * or does not match the database family
 */
export class InvalidInputError extends GeoIpError {
  readonly input: string;

  constructor(input: string, detail: string) {
    super(`Invalid IP address ${JSON.stringify(input)}: ${detail}`);
    this.input = input;
  }
}
