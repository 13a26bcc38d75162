import { describe, it, expect } from "vitest";
import { simulationRequestSchema } from "@shared/schema";
import {
  estimateShaftPower,
  resolveMainPower,
  type ShaftPowerSimulator,
  type SimulationOutcome,
} from "../shaftPowerSource";

const request = simulationRequestSchema.parse({
  gasFlowRate: 50000,
  inletPressure: 4,
  inletTemperature: 20,
  outletPressure: 1,
  efficiency: 80,
});

function fakeSimulator(outcome: SimulationOutcome): ShaftPowerSimulator {
  return { simulate: async () => outcome };
}

describe("shaft power source", () => {
  it("defaults the gas composition to pure methane", () => {
    expect(request.gasComposition.CH4).toBe(100);
    expect(request.gasComposition.N2).toBe(0);
  });

  it("requires a pressure drop", () => {
    const parsed = simulationRequestSchema.safeParse({ ...request, outletPressure: 5 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) expect(parsed.error.errors[0].path).toEqual(["outletPressure"]);
  });

  it("estimates from flow, pressure drop and efficiency", () => {
    expect(estimateShaftPower(request)).toBeCloseTo(120, 9);
  });

  it("never estimates below 10 kW", () => {
    expect(estimateShaftPower({ ...request, gasFlowRate: 1000, inletPressure: 2 })).toBe(10);
  });

  it("prefers a usable simulator result", async () => {
    const resolved = await resolveMainPower(request, fakeSimulator({ powerOutput: 250, properties: { stream: "outlet" } }));
    expect(resolved).toEqual({ mainPower: 250, source: "simulation", properties: { stream: "outlet" } });
  });

  it("falls back to the estimate when the simulator has no power", async () => {
    const resolved = await resolveMainPower(request, fakeSimulator({}));
    expect(resolved.source).toBe("estimate");
    expect(resolved.mainPower).toBeCloseTo(120, 9);
  });

  it("falls back to the estimate for a non-positive result", async () => {
    const resolved = await resolveMainPower(request, fakeSimulator({ powerOutput: -5 }));
    expect(resolved.source).toBe("estimate");
  });

  it("estimates when no simulator is configured", async () => {
    const resolved = await resolveMainPower(request);
    expect(resolved.source).toBe("estimate");
  });

  it("propagates simulator failures", async () => {
    const failing: ShaftPowerSimulator = {
      simulate: async () => {
        throw new Error("simulator offline");
      },
    };
    await expect(resolveMainPower(request, failing)).rejects.toThrow("simulator offline");
  });
});
