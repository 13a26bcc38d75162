import { utilityParamsSchema, type MainEngineResult, type UtilityParams, type UtilityResult } from "@shared/schema";
import { OIL_PUMP_POWER_TABLE, lookupOilPumpPower, type OilPumpPowerTable } from "@shared/oil-pump-library";
import { SizingTableError } from "@shared/sizing-tables";
import { PowerCalculationError, parseOrThrow } from "./calculationErrors";

const LUBRICATION_SAFETY_FACTOR = 1.2;
const MINUTES_PER_HOUR = 60;
const LITRES_PER_CUBIC_METRE = 1000;
const WATER_FLOW_CONVERSION = 3.6;
const HEATER_TO_PUMP_RATIO = 0.5;

function resolveOilPumpPower(lubricationOilAmount: number, table: OilPumpPowerTable): number {
  let power: number | undefined;
  try {
    power = lookupOilPumpPower(lubricationOilAmount, table);
  } catch (err) {
    if (err instanceof SizingTableError) {
      throw new PowerCalculationError("invalid_input", `Lubrication oil amount cannot be sized: ${err.message}`);
    }
    throw err;
  }
  if (power === undefined) {
    throw new PowerCalculationError("sizing_table", "Oil pump power table has no entries");
  }
  return power;
}

/**
 * Utility stage: auxiliary self-consumption and exportable net power.
 *
 * Oil amounts above the largest table breakpoint size to the largest rated
 * pump rather than failing.
 */
export function computeUtility(
  mainResult: MainEngineResult,
  params: UtilityParams,
  oilPumpTable: OilPumpPowerTable = OIL_PUMP_POWER_TABLE,
): UtilityResult {
  const p = parseOrThrow(utilityParamsSchema, params, "invalid_input", "utility parameters");
  const { mainOutputPower, totalPowerGeneration } = mainResult;

  const lubricationOilAmount =
    ((LUBRICATION_SAFETY_FACTOR * mainOutputPower * p.mechanicalLossRatio) /
      (p.lubricationOilDensity * p.lubricationOilHeatCapacity * p.oilCoolerTempRise)) *
    MINUTES_PER_HOUR *
    LITRES_PER_CUBIC_METRE;

  const oilCoolerCirculationWater =
    ((LUBRICATION_SAFETY_FACTOR * mainOutputPower * p.mechanicalLossRatio) /
      p.coolingWaterHeatCapacity /
      p.oilCoolerTempRise) *
    WATER_FLOW_CONVERSION;

  const oilPumpPower = resolveOilPumpPower(lubricationOilAmount, oilPumpTable);
  const lubricationHeaterPower = HEATER_TO_PUMP_RATIO * oilPumpPower;

  const utilitySelfConsumption =
    oilPumpPower + lubricationHeaterPower + p.coolingLoopPumpPower + p.circulationPumpPower;

  return {
    lubricationOilAmount,
    oilCoolerCirculationWater,
    oilPumpPower,
    lubricationHeaterPower,
    coolingLoopPumpPower: p.coolingLoopPumpPower,
    circulationPumpPower: p.circulationPumpPower,
    utilitySelfConsumption,
    totalPowerGeneration,
    netPowerOutput: totalPowerGeneration - utilitySelfConsumption,
    airDemand: p.airDemand,
    nitrogenDemand: p.nitrogenDemand,
  };
}
