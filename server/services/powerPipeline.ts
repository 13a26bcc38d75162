import type {
  CombinedResult,
  EconomicParams,
  MainEngineParams,
  UnitSelectionParams,
  UtilityParams,
} from "@shared/schema";
import { OIL_PUMP_POWER_TABLE, type OilPumpPowerTable } from "@shared/oil-pump-library";
import { UNIT_CATALOG_TABLE, type UnitCatalogTable } from "@shared/unit-catalog-library";
import { computeMainEngine } from "./mainEngine";
import { computeUtility } from "./utilityPower";
import { computeEconomics } from "./economicAnalysis";
import { computeUnitSelection } from "./unitSelection";

export interface SizingTables {
  oilPump: OilPumpPowerTable;
  unitCatalog: UnitCatalogTable;
}

export const DEFAULT_SIZING_TABLES: SizingTables = Object.freeze({
  oilPump: OIL_PUMP_POWER_TABLE,
  unitCatalog: UNIT_CATALOG_TABLE,
});

/**
 * Runs main engine → utility → {economics, unit selection} and assembles the
 * combined result. Economics and unit selection both read only the utility
 * result.
 */
export function runPowerPipeline(
  mainParams: MainEngineParams,
  utilityParams: UtilityParams,
  economicParams: EconomicParams,
  unitParams: UnitSelectionParams,
  tables: SizingTables = DEFAULT_SIZING_TABLES,
): CombinedResult {
  const mainEngine = computeMainEngine(mainParams);
  const utilityPower = computeUtility(mainEngine, utilityParams, tables.oilPump);
  const economicAnalysis = computeEconomics(utilityPower, economicParams);
  const unitSelection = computeUnitSelection(utilityPower, unitParams, tables.unitCatalog);

  console.log(
    `Power Calc: pipeline complete for ${mainParams.mainPower} kW shaft power, ` +
      `net ${utilityPower.netPowerOutput.toFixed(2)} kW, selected ${unitSelection.unitSelection} kW unit`,
  );

  return {
    mainEngine,
    utilityPower,
    economicAnalysis,
    unitSelection,
    calculationSummary: {
      inputMainPower: mainParams.mainPower,
      finalNetPower: utilityPower.netPowerOutput,
      annualIncome: economicAnalysis.annualPowerIncome,
      selectedUnitPower: unitSelection.unitSelection,
    },
  };
}
