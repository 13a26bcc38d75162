import { mainEngineParamsSchema, type MainEngineParams, type MainEngineResult } from "@shared/schema";
import { parseOrThrow } from "./calculationErrors";

/**
 * Main-engine stage: shaft power → mechanical loss, net mechanical output and
 * total electrical generation.
 *
 *   mainOutputPower      = mainPower × cooling × frequency × wheelResistance
 *   mainLossPower        = mainPower × (1 − mainLoss) × cooling × frequency × wheelResistance
 *   totalPowerGeneration = mainOutputPower × wheelLoss × generatorEfficiency
 *
 * Negative shaft power (absorbing machinery) carries through with its sign.
 */
export function computeMainEngine(params: MainEngineParams): MainEngineResult {
  const p = parseOrThrow(mainEngineParamsSchema, params, "invalid_input", "main engine parameters");

  const mainLossPower =
    p.mainPower * (1 - p.mainLossFactor) * p.coolingLossFactor * p.frequencyLossFactor * p.wheelResistanceFactor;

  const mainOutputPower = p.mainPower * p.coolingLossFactor * p.frequencyLossFactor * p.wheelResistanceFactor;

  const totalPowerGeneration = mainOutputPower * p.wheelLossFactor * p.generatorEfficiency;

  return {
    inputPower: p.mainPower,
    mainLossPower,
    mainOutputPower,
    totalPowerGeneration,
  };
}
