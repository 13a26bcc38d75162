import { describe, it, expect } from "vitest";
import { createSizingTable } from "@shared/sizing-tables";
import { buildPipelineParams } from "../powerParams";
import { runPowerPipeline, DEFAULT_SIZING_TABLES } from "../powerPipeline";
import { buildSelectionReport, splitStages, calculatePaybackYears, evaluateChecks } from "../selectionReport";
import { PowerCalculationError } from "../calculationErrors";

function run(mainPower: number) {
  const params = buildPipelineParams(mainPower);
  const result = runPowerPipeline(params.mainEngine, params.utility, params.economic, params.unitSelection);
  return { params, result };
}

describe("buildPipelineParams", () => {
  it("fills every record from defaults", () => {
    const params = buildPipelineParams(100);
    expect(params.mainEngine.mainPower).toBe(100);
    expect(params.mainEngine.generatorEfficiency).toBe(0.85);
    expect(params.utility.coolingLoopPumpPower).toBe(1);
    expect(params.economic.annualOperatingHours).toBe(8000);
    expect(params.unitSelection.dimensions).toEqual([3, 2.5, 2.5]);
  });

  it("lets later override layers win", () => {
    const params = buildPipelineParams(
      100,
      { economic: { electricityPrice: 0.5, standardCoalPrice: 600 } },
      { economic: { electricityPrice: 0.7 } },
    );
    expect(params.economic.electricityPrice).toBe(0.7);
    expect(params.economic.standardCoalPrice).toBe(600);
    expect(params.economic.co2EmissionFactor).toBe(0.96);
  });

  it("returns frozen records", () => {
    const params = buildPipelineParams(100);
    expect(Object.isFrozen(params.mainEngine)).toBe(true);
    expect(Object.isFrozen(params.economic)).toBe(true);
  });

  it("surfaces an out-of-range override as a typed error", () => {
    expect(() => buildPipelineParams(100, { mainEngine: { wheelLossFactor: 0 } })).toThrow(PowerCalculationError);
  });
});

describe("runPowerPipeline", () => {
  it("chains the four stages and summarises them", () => {
    const { result } = run(66.53419);
    expect(result.mainEngine.totalPowerGeneration).toBeCloseTo(45.24399571361179, 9);
    expect(result.utilityPower.netPowerOutput).toBeCloseTo(39.49399571361179, 9);
    expect(result.economicAnalysis.annualPowerIncome).toBeCloseTo(18.957117942533657, 9);
    expect(result.unitSelection.unitSelection).toBe(0);
    expect(result.calculationSummary).toEqual({
      inputMainPower: 66.53419,
      finalNetPower: result.utilityPower.netPowerOutput,
      annualIncome: result.economicAnalysis.annualPowerIncome,
      selectedUnitPower: 0,
    });
  });

  it("passes the same utility result to economics and unit selection", () => {
    const { result } = run(500);
    expect(result.utilityPower.totalPowerGeneration).toBe(result.mainEngine.totalPowerGeneration);
    expect(result.economicAnalysis.annualPowerGeneration).toBe((result.utilityPower.netPowerOutput * 8000) / 10000);
    expect(result.unitSelection.unitSelection).toBe(400);
  });

  it("uses injected sizing tables", () => {
    const params = buildPipelineParams(500);
    const result = runPowerPipeline(params.mainEngine, params.utility, params.economic, params.unitSelection, {
      ...DEFAULT_SIZING_TABLES,
      oilPump: createSizingTable<number>([[1000, 2]]),
    });
    expect(result.utilityPower.oilPumpPower).toBe(2);
    expect(result.utilityPower.utilitySelfConsumption).toBe(6.5);
  });
});

describe("selection report", () => {
  it("reports a single-stage skid below the stage threshold", () => {
    const { params, result } = run(500);
    const report = buildSelectionReport(result, params);
    expect(report.designType).toBe("single_stage");
    expect(report.stageSplit).toBeNull();
    expect(report.modelCode).toBe("TP400");
    expect(report.quote).toBe(400);
    expect(report.selectedUnitPower).toBe(400);
    expect(report.dimensionsLabel).toBe("3.5×2.5×2.5");
    expect(report.weightLabel).toBe("16t/5t");
    expect(report.paybackPeriodYears).toBe(2.5);
    expect(report.checks.passed).toBe(true);
  });

  it("sizes a dual-stage skid on the larger stage", () => {
    const { params, result } = run(3000);
    expect(result.utilityPower.oilPumpPower).toBe(22);
    const report = buildSelectionReport(result, params);
    expect(report.designType).toBe("dual_stage");
    expect(report.stageSplit?.firstStagePower).toBe(1000);
    expect(report.stageSplit?.secondStagePower).toBeCloseTo(1003.53366, 4);
    expect(report.stageSplit?.sizingPower).toBeCloseTo(1003.53366, 4);
    expect(report.modelCode).toBe("TP1003");
    expect(report.quote).toBe(1003);
    // The 1003.5 kW sizing run selects an 800 kW enclosure.
    expect(report.unitDimensions).toEqual([6, 3, 2.5]);
    expect(report.weightLabel).toBe("24t/11t");
    expect(report.paybackPeriodYears).toBe(1);
  });

  it("reports the smallest enclosure for a tiny skid", () => {
    const { params, result } = run(66.53419);
    const report = buildSelectionReport(result, params);
    expect(report.modelCode).toBe("TP0");
    expect(report.paybackPeriodYears).toBe(0);
    expect(report.dimensionsLabel).toBe("3×2.5×2.5");
    expect(report.weightLabel).toBe("14t/5t");
  });

  describe("splitStages", () => {
    it("keeps 1000 kW and below on one stage", () => {
      expect(splitStages(1000)).toBeNull();
    });

    it("never sizes below the first stage", () => {
      expect(splitStages(1200)).toEqual({
        firstStagePower: 1000,
        secondStagePower: 200,
        totalNetPower: 1200,
        sizingPower: 1000,
      });
    });
  });

  it("returns zero payback without positive income", () => {
    expect(calculatePaybackYears(500, 0)).toBe(0);
    expect(calculatePaybackYears(500, -10)).toBe(0);
    expect(calculatePaybackYears(500, 150)).toBe(3.3);
  });

  it("fails the checks for absorbing machinery", () => {
    const { result } = run(-100);
    const checks = evaluateChecks(result);
    expect(checks.netPowerPositive).toBe(false);
    expect(checks.passed).toBe(false);
  });
});
