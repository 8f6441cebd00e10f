import { IpAddress } from "../models/geo-data";
import { InvalidInputError } from "../models/errors";
import { Ipv6Util } from "./ipv6-util";

/**
 * Utility functions for working with IP addresses
 */
export class IpUtil {
  /**
   * Convert an IPv4 address to its numeric representation
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
  }

  /**
   * Convert a numeric representation back to an IPv4 address string
   * Example: 3232235777 -> "192.168.1.1"
   */
  static longToIp(long: number): string {
    return [
      (long >>> 24) & 255,
      (long >>> 16) & 255,
      (long >>> 8) & 255,
      long & 255,
    ].join(".");
  }

  /**
   * Validate if the given string is a valid IPv4 address
   */
  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    return ip
      .split(".")
      .map(Number)
      .every((num) => num >= 0 && num <= 255);
  }

  /**
   * Determine if an IP address is IPv4 or IPv6
   */
  static getIpVersion(ip: string): 4 | 6 | null {
    if (this.isValidIpv4(ip)) return 4;
    if (Ipv6Util.isValid(ip)) return 6;
    return null;
  }

  /**
   * Check if an IP address is valid (either IPv4 or IPv6)
   */
  static isValidIp(ip: string): boolean {
    return this.getIpVersion(ip) !== null;
  }

  /**
   * Parse an address given as text or as raw network-order octets.
   * Throws InvalidInputError before any database is touched.
   */
  static parse(input: string | Uint8Array): IpAddress {
    if (typeof input !== "string") {
      return this.fromBytes(input);
    }

    const ip = input.trim();
    const version = this.getIpVersion(ip);

    if (version === 4) {
      return { version: 4, value: this.ipToLong(ip) };
    }

    if (version === 6) {
      try {
        return { version: 6, value: Ipv6Util.toBigInt(ip) };
      } catch (error: unknown) {
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        throw new InvalidInputError(input, errorMessage);
      }
    }

    throw new InvalidInputError(input, "not an IPv4 or IPv6 address");
  }

  /**
   * Build an address from 4 (IPv4) or 16 (IPv6) octets
   */
  static fromBytes(bytes: Uint8Array): IpAddress {
    if (bytes.length === 4) {
      return {
        version: 4,
        value:
          ((bytes[0] << 24) | (bytes[1] << 16) | (bytes[2] << 8) | bytes[3]) >>>
          0,
      };
    }

    if (bytes.length === 16) {
      return { version: 6, value: Ipv6Util.bytesToBigInt(bytes) };
    }

    throw new InvalidInputError(
      Array.from(bytes).join(","),
      `expected 4 or 16 octets, got ${bytes.length}`
    );
  }

  /**
   * Number of bits in an address of the given family
   */
  static bitLength(version: 4 | 6): 32 | 128 {
    return version === 4 ? 32 : 128;
  }

  /**
   * Value (0 or 1) of the bit at `index`, counting from the least significant bit
   */
  static bitAt(address: IpAddress, index: number): 0 | 1 {
    if (address.version === 4) {
      return ((address.value >>> index) & 1) === 1 ? 1 : 0;
    }
    return ((address.value >> BigInt(index)) & BigInt(1)) === BigInt(1)
      ? 1
      : 0;
  }

  /**
   * Canonical text form, used in log lines
   */
  static format(address: IpAddress): string {
    return address.version === 4
      ? this.longToIp(address.value)
      : Ipv6Util.fromBigInt(address.value);
  }
}
