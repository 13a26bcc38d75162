import type {
  CombinedResult,
  PipelineParams,
  SelectionChecks,
  SelectionReport,
  StageSplit,
  UnitSelectionResult,
} from "@shared/schema";
import { formatDimensions, formatWeights } from "@shared/unit-catalog-library";
import { createMainEngineParams } from "./powerParams";
import { runPowerPipeline, DEFAULT_SIZING_TABLES, type SizingTables } from "./powerPipeline";

// Net output above which the skid is split into two expander stages.
export const DUAL_STAGE_THRESHOLD_KW = 1000;
const FIRST_STAGE_POWER_KW = 1000;
// Quote in 10^4 CNY per kW of installed rating.
const QUOTE_PER_KW = 1.0;

function roundTo(val: number, decimals: number = 0): number {
  const factor = Math.pow(10, decimals);
  return Math.round(val * factor) / factor;
}

export function splitStages(netPowerOutput: number): StageSplit | null {
  if (netPowerOutput <= DUAL_STAGE_THRESHOLD_KW) return null;
  const secondStagePower = netPowerOutput - FIRST_STAGE_POWER_KW;
  return {
    firstStagePower: FIRST_STAGE_POWER_KW,
    secondStagePower,
    totalNetPower: FIRST_STAGE_POWER_KW + secondStagePower,
    sizingPower: Math.max(secondStagePower, FIRST_STAGE_POWER_KW),
  };
}

export function calculatePaybackYears(quote: number, annualPowerIncome: number): number {
  if (annualPowerIncome <= 0) return 0;
  return roundTo(quote / annualPowerIncome, 1);
}

export function evaluateChecks(result: CombinedResult): SelectionChecks {
  const net = result.utilityPower.netPowerOutput;
  const efficiency = net / result.mainEngine.inputPower;
  const netPowerPositive = net > 0;
  const incomePositive = result.economicAnalysis.annualPowerIncome > 0;
  const systemEfficiencyInRange = efficiency > 0 && efficiency < 1;
  return {
    netPowerPositive,
    incomePositive,
    systemEfficiencyInRange,
    passed: netPowerPositive && incomePositive && systemEfficiencyInRange,
  };
}

/**
 * Sign-off summary for a pipeline run. Dual-stage skids are sized on the
 * larger stage: the pipeline is re-run with that power as shaft input to
 * resolve the enclosure, and the sizing power becomes the selected rating.
 */
export function buildSelectionReport(
  result: CombinedResult,
  params: PipelineParams,
  tables: SizingTables = DEFAULT_SIZING_TABLES,
): SelectionReport {
  const netPowerOutput = result.utilityPower.netPowerOutput;
  const stageSplit = splitStages(netPowerOutput);

  let selectedUnitPower = result.unitSelection.unitSelection;
  let unit: UnitSelectionResult = result.unitSelection;

  if (stageSplit) {
    const sizingRun = runPowerPipeline(
      createMainEngineParams({ ...params.mainEngine, mainPower: stageSplit.sizingPower }),
      params.utility,
      params.economic,
      params.unitSelection,
      tables,
    );
    unit = sizingRun.unitSelection;
    selectedUnitPower = stageSplit.sizingPower;
    console.log(
      `Power Calc: net ${netPowerOutput.toFixed(2)} kW exceeds ${DUAL_STAGE_THRESHOLD_KW} kW, ` +
        `dual-stage skid sized on ${stageSplit.sizingPower.toFixed(2)} kW`,
    );
  }

  const ratedPower = Math.trunc(selectedUnitPower);
  const quote = ratedPower * QUOTE_PER_KW;
  const annualPowerIncome = result.economicAnalysis.annualPowerIncome;

  return {
    modelCode: `TP${ratedPower}`,
    quote,
    selectedUnitPower,
    dimensionsLabel: formatDimensions(unit.unitDimensions),
    unitDimensions: unit.unitDimensions,
    weightLabel: formatWeights(unit.unitWeight, unit.maintenanceLiftWeight),
    designType: stageSplit ? "dual_stage" : "single_stage",
    stageSplit,
    netPowerOutput,
    annualPowerIncome,
    paybackPeriodYears: calculatePaybackYears(quote, annualPowerIncome),
    checks: evaluateChecks(result),
  };
}
