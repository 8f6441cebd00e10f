import {
  COUNTRY_BEGIN,
  DatabaseEdition,
  GeoDatabase,
  readUIntLE,
} from "../../src/services/geo-database";
import { FormatError } from "../../src/models/errors";
import {
  buildCountryDatabase,
  buildIpv4CityFixture,
  buildIpv6CityFixture,
  structureInfo,
} from "../fixtures/geoip-fixture";

function expectFormatError(bytes: Uint8Array, reason: FormatError["reason"]) {
  expect.assertions(2);
  try {
    GeoDatabase.load(bytes);
  } catch (error) {
    expect(error).toBeInstanceOf(FormatError);
    if (error instanceof FormatError) {
      expect(error.reason).toBe(reason);
    }
  }
}

describe("GeoDatabase", () => {
  describe("readUIntLE", () => {
    test("should read little-endian integers of the given width", () => {
      const buffer = Buffer.from([0x01, 0x02, 0x03, 0xff]);
      expect(readUIntLE(buffer, 0, 3)).toBe(0x030201);
      expect(readUIntLE(buffer, 1, 3)).toBe(0xff0302);
      expect(readUIntLE(buffer, 3, 1)).toBe(0xff);
    });
  });

  describe("load", () => {
    test("should parse the structure info of an IPv4 city database", () => {
      const fixture = buildIpv4CityFixture();
      const db = GeoDatabase.load(fixture.buffer);

      expect(db.edition).toBe(DatabaseEdition.CITY_REV1);
      expect(db.kind).toBe("city");
      expect(db.revision).toBe(1);
      expect(db.ipVersion).toBe(4);
      expect(db.addressBits).toBe(32);
      expect(db.recordLength).toBe(3);
      expect(db.segments).toBe(fixture.segments);
      expect(db.charset).toBe("latin1");
    });

    test("should parse an IPv6 city database", () => {
      const fixture = buildIpv6CityFixture();
      const db = GeoDatabase.load(fixture.buffer, { ipVersion: 6, charset: "utf8" });

      expect(db.edition).toBe(DatabaseEdition.CITY_REV1_V6);
      expect(db.ipVersion).toBe(6);
      expect(db.addressBits).toBe(128);
      expect(db.segments).toBe(fixture.segments);
      expect(db.charset).toBe("utf8");
    });

    test("should share the caller's bytes instead of copying them", () => {
      const { buffer } = buildIpv4CityFixture();
      const view = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
      const db = GeoDatabase.load(view);

      expect(db.buffer.buffer).toBe(buffer.buffer);
      expect(db.buffer.byteOffset).toBe(buffer.byteOffset);
      expect(db.buffer.length).toBe(buffer.length);
    });

    test("should be frozen", () => {
      const db = GeoDatabase.load(buildIpv4CityFixture().buffer);
      expect(Object.isFrozen(db)).toBe(true);
    });

    test("should treat a buffer without marker as an IPv4 country database", () => {
      const bytes = buildCountryDatabase([{ cidr: "1.0.0.0/8", countryCode: "AU" }], {
        withMarker: false,
      });
      const db = GeoDatabase.load(bytes);

      expect(db.edition).toBe(DatabaseEdition.COUNTRY);
      expect(db.kind).toBe("country");
      expect(db.segments).toBe(COUNTRY_BEGIN);
    });

    test("should recognise the IPv6 country edition", () => {
      const bytes = buildCountryDatabase([{ cidr: "2001:200::/23", countryCode: "JP" }], {
        edition: DatabaseEdition.COUNTRY_V6,
      });
      const db = GeoDatabase.load(bytes);

      expect(db.edition).toBe(DatabaseEdition.COUNTRY_V6);
      expect(db.ipVersion).toBe(6);
      expect(db.segments).toBe(COUNTRY_BEGIN);
    });

    test("should map pre-2003 edition ids back into range", () => {
      const nodes = Buffer.alloc(6);
      nodes.writeUIntLE(1, 0, 3);
      nodes.writeUIntLE(1, 3, 3);
      const bytes = Buffer.concat([nodes, Buffer.from([0]), structureInfo(105 + 2, 1)]);

      const db = GeoDatabase.load(bytes);
      expect(db.edition).toBe(DatabaseEdition.CITY_REV1);
      expect(db.segments).toBe(1);
    });

    test("should reject buffers shorter than one node", () => {
      expectFormatError(Buffer.from([0, 0, 0, 0, 0]), "truncated");
    });

    test("should reject an empty buffer", () => {
      expectFormatError(new Uint8Array(0), "truncated");
    });

    test("should reject a city database whose nodes do not fit", () => {
      const bytes = Buffer.concat([Buffer.alloc(12), structureInfo(DatabaseEdition.CITY_REV1, 100)]);
      expectFormatError(bytes, "truncated");
    });

    test("should reject a city database without segments", () => {
      const bytes = Buffer.concat([Buffer.alloc(12), structureInfo(DatabaseEdition.CITY_REV1, 0)]);
      expectFormatError(bytes, "invalid-structure");
    });

    test("should reject editions the decoder cannot read", () => {
      const orgEdition = 5;
      const bytes = Buffer.concat([Buffer.alloc(12), structureInfo(orgEdition, 2)]);
      expectFormatError(bytes, "unsupported-edition");
    });

    test("should reject a database of the wrong family", () => {
      expect(() =>
        GeoDatabase.load(buildIpv6CityFixture().buffer, { ipVersion: 4 })
      ).toThrow("wrong-family: edition 30 holds IPv6 data, IPv4 was expected");
    });
  });
});
