import {
  unitSelectionParamsSchema,
  type UnitSelectionParams,
  type UnitSelectionResult,
  type UtilityResult,
} from "@shared/schema";
import { UNIT_CATALOG_TABLE, lookupUnitCatalog, type UnitCatalogTable } from "@shared/unit-catalog-library";
import { PowerCalculationError, parseOrThrow } from "./calculationErrors";

const SELECTION_MARGIN = 1.1;
const CATALOG_STEP_KW = 100;

/**
 * Rounds to the nearest integer, sending exact .5 ties to the even neighbour
 * (2.5 → 2, 3.5 → 4, -5.5 → -6).
 */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) return value;
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Installed rating: 10% margin on total generation, on the 100 kW catalog step. */
export function selectInstalledPower(totalPowerGeneration: number): number {
  return roundHalfEven((totalPowerGeneration * SELECTION_MARGIN) / CATALOG_STEP_KW) * CATALOG_STEP_KW;
}

export function computeUnitSelection(
  utilityResult: UtilityResult,
  params: UnitSelectionParams,
  unitCatalog: UnitCatalogTable = UNIT_CATALOG_TABLE,
): UnitSelectionResult {
  const p = parseOrThrow(unitSelectionParamsSchema, params, "invalid_input", "unit selection parameters");

  const unitSelection = selectInstalledPower(utilityResult.totalPowerGeneration);
  if (!Number.isFinite(unitSelection)) {
    throw new PowerCalculationError("invalid_input", `Total power generation ${utilityResult.totalPowerGeneration} is not finite`);
  }

  const catalogEntry = lookupUnitCatalog(unitSelection, unitCatalog);
  if (!catalogEntry) {
    return {
      unitSelection,
      lookupPower: unitSelection,
      unitDimensions: p.dimensions,
      unitWeight: p.weightPerUnit,
      maintenanceLiftWeight: p.maintenanceLiftWeight,
      dimensionSource: "default",
    };
  }

  return {
    unitSelection,
    lookupPower: unitSelection,
    unitDimensions: catalogEntry.dimensions,
    unitWeight: catalogEntry.unitWeight,
    maintenanceLiftWeight: catalogEntry.maintenanceLiftWeight,
    dimensionSource: "catalog",
  };
}
