import { describe, it, expect } from "vitest";
import { createSizingTable, ceilingLookup, maxEntry, SizingTableError } from "../sizing-tables";
import { OIL_PUMP_POWER_TABLE, lookupOilPumpPower } from "../oil-pump-library";
import { UNIT_CATALOG_TABLE, lookupUnitCatalog, formatDimensions, formatWeights } from "../unit-catalog-library";

describe("sizing tables", () => {
  const table = createSizingTable<string>([
    [10, "small"],
    [20, "medium"],
    [40, "large"],
  ]);

  describe("createSizingTable", () => {
    it("rejects breakpoints out of ascending order", () => {
      expect(() =>
        createSizingTable<number>([
          [10, 1],
          [5, 2],
        ]),
      ).toThrow(SizingTableError);
    });

    it("rejects non-finite breakpoints", () => {
      expect(() => createSizingTable<number>([[Infinity, 1]])).toThrow(SizingTableError);
    });

    it("freezes the table", () => {
      expect(Object.isFrozen(table)).toBe(true);
    });
  });

  describe("ceilingLookup", () => {
    it("returns the first entry at or above the query", () => {
      expect(ceilingLookup(table, 10)?.value).toBe("small");
      expect(ceilingLookup(table, 10.01)?.value).toBe("medium");
      expect(ceilingLookup(table, 20)?.value).toBe("medium");
      expect(ceilingLookup(table, 39)?.value).toBe("large");
    });

    it("resolves queries below the first breakpoint to the first entry", () => {
      expect(ceilingLookup(table, -100)?.value).toBe("small");
    });

    it("clamps queries above the last breakpoint to the last entry", () => {
      expect(ceilingLookup(table, 40)?.value).toBe("large");
      expect(ceilingLookup(table, 1e9)?.value).toBe("large");
    });

    it("returns undefined for an empty table", () => {
      expect(ceilingLookup(createSizingTable<number>([]), 5)).toBeUndefined();
      expect(maxEntry(createSizingTable<number>([]))).toBeUndefined();
    });

    it("throws on NaN", () => {
      expect(() => ceilingLookup(table, NaN)).toThrow(SizingTableError);
    });

    it("is monotonic in the query", () => {
      const values: number[] = [];
      for (let q = 0; q <= 1200; q += 7) {
        const power = lookupOilPumpPower(q);
        expect(power).toBeDefined();
        values.push(power ?? 0);
      }
      for (let i = 1; i < values.length; i++) {
        expect(values[i]).toBeGreaterThanOrEqual(values[i - 1]);
      }
    });
  });

  describe("oil pump table", () => {
    it("sizes at the exact breakpoint and just above it", () => {
      expect(lookupOilPumpPower(225)).toBe(7.5);
      expect(lookupOilPumpPower(225.01)).toBe(11);
      expect(lookupOilPumpPower(13.26)).toBe(1.5);
    });

    it("clamps oversized amounts to the largest pump", () => {
      expect(lookupOilPumpPower(2117.6)).toBe(30);
      expect(maxEntry(OIL_PUMP_POWER_TABLE)?.value).toBe(30);
    });
  });

  describe("unit catalog", () => {
    it("maps a zero rating to the smallest enclosure", () => {
      const entry = lookupUnitCatalog(0);
      expect(entry?.dimensions).toEqual([3, 2.5, 2.5]);
      expect(entry?.unitWeight).toBe(14);
      expect(entry?.maintenanceLiftWeight).toBe(5);
    });

    it("rounds ratings up to the next catalog size", () => {
      const entry = lookupUnitCatalog(600);
      expect(entry?.dimensions).toEqual([5, 3, 2.5]);
      expect(entry?.unitWeight).toBe(20);
    });

    it("freezes the dimension tuples", () => {
      for (const { value } of UNIT_CATALOG_TABLE) {
        expect(Object.isFrozen(value)).toBe(true);
        expect(Object.isFrozen(value.dimensions)).toBe(true);
      }
    });

    it("clamps ratings above the catalog", () => {
      expect(lookupUnitCatalog(9000)).toBe(maxEntry(UNIT_CATALOG_TABLE)?.value);
    });

    it("formats labels", () => {
      expect(formatDimensions([4.5, 2.5, 2.5])).toBe("4.5×2.5×2.5");
      expect(formatWeights(17, 6)).toBe("17t/6t");
    });
  });
});
