import { economicParamsSchema, type EconomicParams, type EconomicResult, type UtilityResult } from "@shared/schema";
import { parseOrThrow } from "./calculationErrors";

// Annual energy is reported in units of 10^4 kWh.
const ANNUAL_ENERGY_SCALE = 10000;

// Zero hours against negative net power would otherwise report -0.
function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}

export function computeEconomics(utilityResult: UtilityResult, params: EconomicParams): EconomicResult {
  const p = parseOrThrow(economicParamsSchema, params, "parameter_range", "economic parameters");

  const annualPowerGeneration = normalizeZero(
    (utilityResult.netPowerOutput * p.annualOperatingHours) / ANNUAL_ENERGY_SCALE,
  );
  const annualCoalSavings = normalizeZero(annualPowerGeneration * p.standardCoalCoefficient);

  return {
    annualPowerGeneration,
    annualPowerIncome: normalizeZero(annualPowerGeneration * p.electricityPrice),
    annualCoalSavings,
    annualCoalCostSavings: normalizeZero(annualCoalSavings * p.standardCoalPrice),
    annualCo2Reduction: normalizeZero(annualPowerGeneration * p.co2EmissionFactor),
  };
}
