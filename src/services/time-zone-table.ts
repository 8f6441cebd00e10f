import fs from "fs";
import csv from "csv-parser";
import { TimeZoneResolver } from "../models/geo-data";

interface TimeZoneRow {
  country_code?: string;
  region?: string;
  time_zone?: string;
}

/**
 * Country/region to IANA time zone mapping.
 * A row with an empty region is the default for the whole country.
 */
export class TimeZoneTable implements TimeZoneResolver {
  private readonly zones = new Map<string, string>();

  constructor(rows: Iterable<TimeZoneRow>) {
    for (const row of rows) {
      const countryCode = row.country_code?.trim();
      const timeZone = row.time_zone?.trim();
      if (!countryCode || !timeZone) continue;

      this.zones.set(this.key(countryCode, row.region?.trim() || null), timeZone);
    }
  }

  /**
   * Parse the CSV file at `filePath` (columns: country_code, region, time_zone)
   */
  static load(filePath: string): Promise<TimeZoneTable> {
    return new Promise((resolve, reject) => {
      const rows: TimeZoneRow[] = [];

      fs.createReadStream(filePath)
        .on("error", reject)
        .pipe(csv())
        .on("data", (row: TimeZoneRow) => {
          rows.push(row);
        })
        .on("end", () => {
          const table = new TimeZoneTable(rows);
          console.log(`Loaded time zone table with ${table.size} entries`);
          resolve(table);
        })
        .on("error", (error) => {
          reject(error);
        });
    });
  }

  get size(): number {
    return this.zones.size;
  }

  resolve(countryCode: string, region: string | null): string | null {
    if (region) {
      const regional = this.zones.get(this.key(countryCode, region));
      if (regional) return regional;
    }
    return this.zones.get(this.key(countryCode, null)) ?? null;
  }

  private key(countryCode: string, region: string | null): string {
    return `${countryCode.toUpperCase()}:${region ?? ""}`;
  }
}
