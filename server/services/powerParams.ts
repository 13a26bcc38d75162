import {
  mainEngineParamsSchema,
  utilityParamsSchema,
  economicParamsSchema,
  unitSelectionParamsSchema,
  type MainEngineParams,
  type MainEngineParamsInput,
  type UtilityParams,
  type UtilityParamsInput,
  type EconomicParams,
  type EconomicParamsInput,
  type UnitSelectionParams,
  type UnitSelectionParamsInput,
  type ParameterOverrides,
  type PipelineParams,
} from "@shared/schema";
import { parseOrThrow } from "./calculationErrors";

export function createMainEngineParams(input: MainEngineParamsInput): MainEngineParams {
  return Object.freeze(parseOrThrow(mainEngineParamsSchema, input, "invalid_input", "main engine parameters"));
}

export function createUtilityParams(input: UtilityParamsInput = {}): UtilityParams {
  return Object.freeze(parseOrThrow(utilityParamsSchema, input, "invalid_input", "utility parameters"));
}

export function createEconomicParams(input: EconomicParamsInput = {}): EconomicParams {
  return Object.freeze(parseOrThrow(economicParamsSchema, input, "parameter_range", "economic parameters"));
}

export function createUnitSelectionParams(input: UnitSelectionParamsInput = {}): UnitSelectionParams {
  return Object.freeze(parseOrThrow(unitSelectionParamsSchema, input, "invalid_input", "unit selection parameters"));
}

/**
 * Builds all four records for a run. Later override layers win over earlier
 * ones, and schema defaults fill whatever no layer sets.
 */
export function buildPipelineParams(
  mainPower: number,
  ...layers: Partial<ParameterOverrides>[]
): PipelineParams {
  const merged: ParameterOverrides = { mainEngine: {}, utility: {}, economic: {}, unitSelection: {} };
  for (const layer of layers) {
    merged.mainEngine = { ...merged.mainEngine, ...layer.mainEngine };
    merged.utility = { ...merged.utility, ...layer.utility };
    merged.economic = { ...merged.economic, ...layer.economic };
    merged.unitSelection = { ...merged.unitSelection, ...layer.unitSelection };
  }

  return {
    mainEngine: createMainEngineParams({ ...merged.mainEngine, mainPower }),
    utility: createUtilityParams(merged.utility),
    economic: createEconomicParams(merged.economic),
    unitSelection: createUnitSelectionParams(merged.unitSelection),
  };
}
