import { createSizingTable, ceilingLookup, type SizingTable } from "./sizing-tables";

/** Lubrication oil amount (utility-stage units) → rated oil pump power (kW). */
export type OilPumpPowerTable = SizingTable<number>;

export const OIL_PUMP_POWER_TABLE: OilPumpPowerTable = createSizingTable<number>([
  [28.4, 1.5],
  [37.9, 1.5],
  [60, 2.2],
  [80, 3],
  [108, 4],
  [157, 5.5],
  [189, 7.5],
  [225, 7.5],
  [277, 11],
  [319, 11],
  [401, 15],
  [471, 15],
  [536, 15],
  [596, 18.5],
  [662, 22],
  [846, 30],
  [1035, 30],
]);

export function lookupOilPumpPower(
  lubricationOilAmount: number,
  table: OilPumpPowerTable = OIL_PUMP_POWER_TABLE,
): number | undefined {
  return ceilingLookup(table, lubricationOilAmount)?.value;
}
