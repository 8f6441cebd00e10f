import { CountryTable } from "../../src/services/country-table";

describe("CountryTable", () => {
  test("should keep the no-country placeholder at index 0", () => {
    expect(CountryTable.at(0)).toEqual({
      code: "",
      code3: "",
      name: "N/A",
      continent: "--",
    });
  });

  test.each([
    [77, "GB", "GBR", "United Kingdom"],
    [225, "US", "USA", "United States"],
    [56, "DE", "DEU", "Germany"],
    [16, "AU", "AUS", "Australia"],
  ])("should map index %i to %s / %s", (index, code, code3, name) => {
    expect(CountryTable.at(index)).toMatchObject({ code, code3, name });
    expect(CountryTable.indexOf(code)).toBe(index);
  });

  test("should return undefined past the last index", () => {
    expect(CountryTable.at(255)).toMatchObject({ code: "O1", code3: "O1" });
    expect(CountryTable.at(256)).toBeUndefined();
  });

  test("should not know unlisted codes", () => {
    expect(CountryTable.indexOf("XX")).toBe(-1);
  });
});
