import countries from "../data/countries.json";
import { CountryEntry } from "../models/geo-data";

const entries: readonly CountryEntry[] = countries;

/**
 * Index-ordered country table of the legacy database format.
 * Index 0 is the "no country" placeholder.
 */
export class CountryTable {
  static at(index: number): CountryEntry | undefined {
    return entries[index];
  }

  static indexOf(code: string): number {
    return entries.findIndex((entry) => entry.code === code);
  }
}
