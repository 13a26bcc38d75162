import type { UnitDimensions } from "./schema";
import { createSizingTable, ceilingLookup, type SizingTable } from "./sizing-tables";

export interface UnitCatalogEntry {
  dimensions: UnitDimensions;
  /** Complete skid weight (t). */
  unitWeight: number;
  /** Heaviest single lift during maintenance (t). */
  maintenanceLiftWeight: number;
}

/** Installed power rating (kW) → enclosure and weights. */
export type UnitCatalogTable = SizingTable<UnitCatalogEntry>;

function entry(
  power: number,
  dimensions: UnitDimensions,
  unitWeight: number,
  maintenanceLiftWeight: number,
): readonly [number, UnitCatalogEntry] {
  return [power, Object.freeze({ dimensions: Object.freeze(dimensions), unitWeight, maintenanceLiftWeight })];
}

export const UNIT_CATALOG_TABLE: UnitCatalogTable = createSizingTable<UnitCatalogEntry>([
  entry(0, [3, 2.5, 2.5], 14, 5),
  entry(250, [3, 2.5, 2.5], 15, 5),
  entry(400, [3.5, 2.5, 2.5], 16, 5),
  entry(450, [4, 2.5, 2.5], 17, 5),
  entry(500, [4.5, 2.5, 2.5], 17, 6),
  entry(560, [4.5, 3, 2.5], 18, 8),
  entry(630, [5, 3, 2.5], 20, 9),
  entry(710, [5.5, 3, 2.5], 22, 10),
  entry(800, [6, 3, 2.5], 24, 11),
  entry(900, [6.5, 3, 2.5], 25, 12),
  entry(1120, [6.5, 3, 2.5], 26, 12),
  entry(1250, [6.5, 3, 2.5], 27, 13),
  entry(1400, [7, 3, 2.5], 28, 13),
  entry(1600, [7.5, 3, 2.5], 29, 14),
  entry(1800, [8, 3.5, 2.5], 30, 15),
  entry(2000, [8.5, 3.5, 2.5], 31, 16),
  entry(2240, [9, 3.5, 2.5], 32, 16),
  entry(2500, [9.5, 4, 2.5], 33, 16),
  entry(2800, [9.5, 4, 2.5], 34, 17),
  entry(3150, [10.5, 4, 2.5], 35, 17),
  entry(3550, [11, 4, 2.5], 38, 18),
  entry(4000, [12, 4, 2.5], 40, 18),
  entry(7000, [12, 6, 4], 50, 20),
]);

export function lookupUnitCatalog(
  unitPower: number,
  table: UnitCatalogTable = UNIT_CATALOG_TABLE,
): UnitCatalogEntry | undefined {
  return ceilingLookup(table, unitPower)?.value;
}

export function formatDimensions(dimensions: UnitDimensions): string {
  return `${dimensions[0]}×${dimensions[1]}×${dimensions[2]}`;
}

export function formatWeights(unitWeight: number, maintenanceLiftWeight: number): string {
  return `${unitWeight}t/${maintenanceLiftWeight}t`;
}
