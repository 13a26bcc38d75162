import type { MainPowerSource, SimulationRequest } from "@shared/schema";

export interface SimulationOutcome {
  /** Shaft power reported by the simulator (kW); absent when it produced none. */
  powerOutput?: number;
  /** Stream and block properties, opaque to the calculator. */
  properties?: Record<string, unknown>;
}

/** Process simulator that turns flow, pressure, temperature and composition into shaft power. */
export interface ShaftPowerSimulator {
  simulate(request: SimulationRequest): Promise<SimulationOutcome>;
}

export interface ResolvedMainPower {
  mainPower: number;
  source: Exclude<MainPowerSource, "direct">;
  properties?: Record<string, unknown>;
}

const MIN_ESTIMATED_POWER_KW = 10;

/** Empirical shaft power used when no simulator result is available. */
export function estimateShaftPower(request: SimulationRequest): number {
  const pressureDrop = request.inletPressure - request.outletPressure;
  const estimate = ((request.gasFlowRate * pressureDrop * request.efficiency) / 100) * 0.001;
  return Math.max(estimate, MIN_ESTIMATED_POWER_KW);
}

export async function resolveMainPower(
  request: SimulationRequest,
  simulator?: ShaftPowerSimulator,
): Promise<ResolvedMainPower> {
  if (simulator) {
    const outcome = await simulator.simulate(request);
    const power = outcome.powerOutput;
    if (power !== undefined && Number.isFinite(power) && power > 0) {
      console.log(`Power Calc: using simulated shaft power ${power} kW`);
      return { mainPower: power, source: "simulation", properties: outcome.properties };
    }
    console.warn("Power Calc: simulator returned no usable shaft power, falling back to estimate");
  }

  const mainPower = estimateShaftPower(request);
  console.log(`Power Calc: using estimated shaft power ${mainPower} kW`);
  return { mainPower, source: "estimate" };
}
