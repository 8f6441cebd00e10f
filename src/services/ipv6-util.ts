/**
 * Dedicated utility class for IPv6 address processing
 * Handles the compressed, embedded-IPv4 and zone-id forms
 */
export class Ipv6Util {
  private static readonly EMBEDDED_IPV4_REGEX =
    /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

  private static readonly MAX_IPV6 = (BigInt(1) << BigInt(128)) - BigInt(1);

  /**
   * Drop a trailing zone id ("fe80::1%eth0" -> "fe80::1")
   */
  public static stripZone(ip: string): string {
    const zoneIndex = ip.indexOf("%");
    return zoneIndex === -1 ? ip : ip.substring(0, zoneIndex);
  }

  /**
   * Validate if a string is a valid IPv6 address: eight hex groups, or fewer
   * around a single "::", optionally ending in a dotted IPv4 tail
   */
  public static isValid(ip: string): boolean {
    try {
      this.normalize(ip);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Normalize an IPv6 address to eight lowercase hex groups
   * without leading zeros, e.g. "2001:db8::1" -> "2001:db8:0:0:0:0:0:1".
   * An embedded IPv4 tail is folded into the last two groups.
   */
  public static normalize(ip: string): string {
    if (!ip) {
      throw new Error("IPv6 address cannot be empty");
    }

    let address = this.stripZone(ip.trim()).toLowerCase();

    if (address.includes(".")) {
      address = this.foldEmbeddedIpv4(address);
    }

    let segments: string[];
    if (address.includes("::")) {
      const parts = address.split("::");
      if (parts.length !== 2) {
        throw new Error(
          `Invalid IPv6 address: ${ip} (multiple :: compression markers)`
        );
      }

      const leftSegments = parts[0] ? parts[0].split(":") : [];
      const rightSegments = parts[1] ? parts[1].split(":") : [];

      const missingSegments = 8 - (leftSegments.length + rightSegments.length);
      if (missingSegments < 1) {
        throw new Error(`Invalid IPv6 address: ${ip} (too many segments)`);
      }

      segments = [
        ...leftSegments,
        ...Array<string>(missingSegments).fill("0"),
        ...rightSegments,
      ];
    } else {
      segments = address.split(":");
      if (segments.length !== 8) {
        throw new Error(
          `Invalid IPv6 address: ${ip} (expected 8 segments, got ${segments.length})`
        );
      }
    }

    return segments
      .map((segment) => {
        if (!/^[0-9a-f]{1,4}$/.test(segment)) {
          throw new Error(`Invalid IPv6 segment: ${segment} in address ${ip}`);
        }
        return parseInt(segment, 16).toString(16);
      })
      .join(":");
  }

  /**
   * Replace the dotted IPv4 tail of an address with two hex groups
   */
  private static foldEmbeddedIpv4(address: string): string {
    const tailStart = address.lastIndexOf(":") + 1;
    const match = this.EMBEDDED_IPV4_REGEX.exec(address.substring(tailStart));
    if (!match) {
      throw new Error(`Invalid embedded IPv4 segment in IPv6: ${address}`);
    }

    const octets = match.slice(1).map((octet) => parseInt(octet, 10));
    if (octets.some((octet) => octet > 255)) {
      throw new Error(`Invalid embedded IPv4 segment in IPv6: ${address}`);
    }

    const high = (octets[0] << 8) | octets[1];
    const low = (octets[2] << 8) | octets[3];
    return (
      address.substring(0, tailStart) +
      high.toString(16) +
      ":" +
      low.toString(16)
    );
  }

  /**
   * Convert an IPv6 address to BigInt for bit-level traversal
   */
  public static toBigInt(ip: string): bigint {
    try {
      let result = BigInt(0);
      for (const segment of this.normalize(ip).split(":")) {
        result = (result << BigInt(16)) | BigInt(parseInt(segment, 16));
      }
      return result;
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);

      throw new Error(
        `Failed to convert IPv6 to BigInt (${ip}): ${errorMessage}`
      );
    }
  }

  /**
   * Convert 16 network-order octets to BigInt
   */
  public static bytesToBigInt(bytes: Uint8Array): bigint {
    if (bytes.length !== 16) {
      throw new Error(`IPv6 address needs 16 octets, got ${bytes.length}`);
    }

    let result = BigInt(0);
    for (const byte of bytes) {
      result = (result << BigInt(8)) | BigInt(byte);
    }
    return result;
  }

  /**
   * Convert a BigInt back to an IPv6 address string
   */
  public static fromBigInt(value: bigint): string {
    if (value < BigInt(0) || value > this.MAX_IPV6) {
      throw new Error(`BigInt value out of range for IPv6: ${value}`);
    }

    const groups: string[] = [];
    for (let shift = 112; shift >= 0; shift -= 16) {
      groups.push(((value >> BigInt(shift)) & BigInt(0xffff)).toString(16));
    }
    return groups.join(":");
  }
}
