import { IpAddress } from "../models/geo-data";
import { CorruptDataError, InvalidInputError } from "../models/errors";
import { GeoDatabase, readUIntLE } from "./geo-database";
import { IpUtil } from "./ip-util";

/**
 * Descent through the binary trie of a legacy database.
 *
 * Each node holds two little-endian pointers (left for a 0 bit, right for a 1
 * bit). A pointer below `segments` is the next node; any other pointer ends
 * the walk. The walk never takes more steps than the address has bits.
 */
export class TrieSearchUtil {
  /**
   * Follow `address` from the root and return the terminal pointer,
   * or null when the bits run out before a terminal pointer is reached
   */
  static seek(db: GeoDatabase, address: IpAddress): number | null {
    if (address.version !== db.ipVersion) {
      throw new InvalidInputError(
        IpUtil.format(address),
        `IPv${address.version} address cannot be looked up in an IPv${db.ipVersion} database`
      );
    }

    const { buffer, recordLength, segments } = db;
    const nodeLength = 2 * recordLength;
    let offset = 0;

    for (let depth = db.addressBits - 1; depth >= 0; depth--) {
      const nodeStart = offset * nodeLength;
      if (nodeStart + nodeLength > buffer.length) {
        throw new CorruptDataError(
          nodeStart,
          `Trie node ${offset} lies outside the database`
        );
      }

      const bit = IpUtil.bitAt(address, depth);
      const pointer = readUIntLE(
        buffer,
        nodeStart + bit * recordLength,
        recordLength
      );

      if (pointer >= segments) {
        return pointer;
      }
      offset = pointer;
    }

    const ip = IpUtil.format(address);
    console.warn(
      `Trie walk for ${ip} used all ${db.addressBits} bits without reaching a record`
    );
    return null;
  }
}
