/**
 * Shared data model for the power skid calculator.
 * Defines the persisted tables, the parameter records consumed by the four
 * calculation stages, and the result records they produce. Both the server
 * and the export layer import from here so the shapes stay in one place.
 */

import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, doublePrecision } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Parameter records
// ---------------------------------------------------------------------------

const lossFactor = (defaultValue: number) => z.number().finite().gt(0).max(1).default(defaultValue);
const positiveConstant = (defaultValue: number) => z.number().finite().positive().default(defaultValue);
const nonNegative = (defaultValue: number) => z.number().finite().nonnegative().default(defaultValue);

/**
 * Main engine: shaft power from the simulator plus the loss/efficiency chain.
 * mainPower is sign-significant (negative for absorbing machinery) but must be
 * finite and non-zero.
 */
export const mainEngineParamsSchema = z.object({
  mainPower: z.number().finite().refine((v) => v !== 0, { message: "mainPower must be non-zero" }),
  wheelLossFactor: lossFactor(0.85),
  generatorEfficiency: lossFactor(0.85),
  mainLossFactor: lossFactor(0.8),
  coolingLossFactor: lossFactor(0.98),
  frequencyLossFactor: lossFactor(0.98),
  wheelResistanceFactor: lossFactor(0.98),
});

export type MainEngineParams = Readonly<z.infer<typeof mainEngineParamsSchema>>;
export type MainEngineParamsInput = z.input<typeof mainEngineParamsSchema>;

/** Utility (auxiliary) constants. All strictly positive, no interdependency. */
export const utilityParamsSchema = z.object({
  mechanicalLossRatio: positiveConstant(0.04),
  lubricationOilDensity: positiveConstant(850),
  lubricationOilHeatCapacity: positiveConstant(2),
  oilCoolerTempRise: positiveConstant(8),
  coolingWaterHeatCapacity: positiveConstant(4.2),
  coolingLoopPumpPower: positiveConstant(1.0),
  circulationPumpPower: positiveConstant(2.5),
  airDemand: positiveConstant(4),
  nitrogenDemand: positiveConstant(40),
});

export type UtilityParams = Readonly<z.infer<typeof utilityParamsSchema>>;
export type UtilityParamsInput = z.input<typeof utilityParamsSchema>;

export const HOURS_PER_YEAR = 8760;

export const economicParamsSchema = z.object({
  annualOperatingHours: z.number().finite().nonnegative().max(HOURS_PER_YEAR).default(8000),
  electricityPrice: nonNegative(0.6),
  standardCoalCoefficient: nonNegative(0.35),
  standardCoalPrice: nonNegative(500),
  co2EmissionFactor: nonNegative(0.96),
});

export type EconomicParams = Readonly<z.infer<typeof economicParamsSchema>>;
export type EconomicParamsInput = z.input<typeof economicParamsSchema>;

// Length, width, height in metres.
export type UnitDimensions = readonly [number, number, number];

const dimensionsSchema = z.tuple([
  z.number().finite().positive(),
  z.number().finite().positive(),
  z.number().finite().positive(),
]);

/** Fallbacks used only when the unit catalog cannot resolve a rating. */
export const unitSelectionParamsSchema = z.object({
  dimensions: dimensionsSchema.default([3, 2.5, 2.5]),
  weightPerUnit: positiveConstant(15),
  maintenanceLiftWeight: positiveConstant(5),
});

export type UnitSelectionParams = Readonly<z.infer<typeof unitSelectionParamsSchema>>;
export type UnitSelectionParamsInput = z.input<typeof unitSelectionParamsSchema>;

export interface PipelineParams {
  mainEngine: MainEngineParams;
  utility: UtilityParams;
  economic: EconomicParams;
  unitSelection: UnitSelectionParams;
}

// Partial overrides accepted from requests and stored configuration.
export const mainEngineOverridesSchema = mainEngineParamsSchema.omit({ mainPower: true }).partial().strict();
export const utilityOverridesSchema = utilityParamsSchema.partial().strict();
export const economicOverridesSchema = economicParamsSchema.partial().strict();
export const unitSelectionOverridesSchema = unitSelectionParamsSchema.partial().strict();

export type MainEngineOverrides = z.infer<typeof mainEngineOverridesSchema>;
export type UtilityOverrides = z.infer<typeof utilityOverridesSchema>;
export type EconomicOverrides = z.infer<typeof economicOverridesSchema>;
export type UnitSelectionOverrides = z.infer<typeof unitSelectionOverridesSchema>;

export const CONFIG_SECTIONS = ["mainEngine", "utility", "economic", "unitSelection"] as const;
export type ConfigSection = (typeof CONFIG_SECTIONS)[number];

export interface ParameterOverrides {
  mainEngine: MainEngineOverrides;
  utility: UtilityOverrides;
  economic: EconomicOverrides;
  unitSelection: UnitSelectionOverrides;
}

export const sectionOverrideSchemas = {
  mainEngine: mainEngineOverridesSchema,
  utility: utilityOverridesSchema,
  economic: economicOverridesSchema,
  unitSelection: unitSelectionOverridesSchema,
} satisfies Record<ConfigSection, z.ZodTypeAny>;

/** All four sections at once; a missing section means no overrides for it. */
export const parameterOverridesSchema = z.object({
  mainEngine: mainEngineOverridesSchema.default({}),
  utility: utilityOverridesSchema.default({}),
  economic: economicOverridesSchema.default({}),
  unitSelection: unitSelectionOverridesSchema.default({}),
});

// ---------------------------------------------------------------------------
// Stage results
// ---------------------------------------------------------------------------

export interface MainEngineResult {
  inputPower: number;
  mainLossPower: number;
  mainOutputPower: number;
  totalPowerGeneration: number;
}

export interface UtilityResult {
  lubricationOilAmount: number;
  oilCoolerCirculationWater: number;
  oilPumpPower: number;
  lubricationHeaterPower: number;
  coolingLoopPumpPower: number;
  circulationPumpPower: number;
  utilitySelfConsumption: number;
  totalPowerGeneration: number;
  netPowerOutput: number;
  airDemand: number;
  nitrogenDemand: number;
}

/** Energy in 10^4 kWh, money in 10^4 CNY, masses per the configured coefficients. */
export interface EconomicResult {
  annualPowerGeneration: number;
  annualPowerIncome: number;
  annualCoalSavings: number;
  annualCoalCostSavings: number;
  annualCo2Reduction: number;
}

export interface UnitSelectionResult {
  unitSelection: number;
  lookupPower: number;
  unitDimensions: UnitDimensions;
  unitWeight: number;
  maintenanceLiftWeight: number;
  dimensionSource: "catalog" | "default";
}

export interface CalculationSummary {
  inputMainPower: number;
  finalNetPower: number;
  annualIncome: number;
  selectedUnitPower: number;
}

export interface CombinedResult {
  mainEngine: MainEngineResult;
  utilityPower: UtilityResult;
  economicAnalysis: EconomicResult;
  unitSelection: UnitSelectionResult;
  calculationSummary: CalculationSummary;
}

// ---------------------------------------------------------------------------
// Selection report
// ---------------------------------------------------------------------------

export type DesignType = "single_stage" | "dual_stage";

export interface StageSplit {
  firstStagePower: number;
  secondStagePower: number;
  totalNetPower: number;
  sizingPower: number;
}

export interface SelectionChecks {
  netPowerPositive: boolean;
  incomePositive: boolean;
  systemEfficiencyInRange: boolean;
  passed: boolean;
}

export interface SelectionReport {
  modelCode: string;
  quote: number;
  selectedUnitPower: number;
  dimensionsLabel: string;
  unitDimensions: UnitDimensions;
  weightLabel: string;
  designType: DesignType;
  stageSplit: StageSplit | null;
  netPowerOutput: number;
  annualPowerIncome: number;
  paybackPeriodYears: number;
  checks: SelectionChecks;
}

export type MainPowerSource = "direct" | "simulation" | "estimate";

// ---------------------------------------------------------------------------
// Process simulation
// ---------------------------------------------------------------------------

/** Mole percentages of the process gas. */
export const gasCompositionSchema = z.object({
  CH4: z.number().min(0).max(100).default(100),
  C2H6: z.number().min(0).max(100).default(0),
  C3H8: z.number().min(0).max(100).default(0),
  C4H10: z.number().min(0).max(100).default(0),
  N2: z.number().min(0).max(100).default(0),
  CO2: z.number().min(0).max(100).default(0),
  H2S: z.number().min(0).max(100).default(0),
});

export const simulationRequestSchema = z
  .object({
    gasFlowRate: z.number().finite().positive(), // scmh
    inletPressure: z.number().finite().positive(), // MPaA
    inletTemperature: z.number().finite(), // °C
    outletPressure: z.number().finite().positive(), // MPaA
    efficiency: z.number().finite().gt(0).max(100), // %
    gasComposition: gasCompositionSchema.default({}),
  })
  .refine((r) => r.inletPressure > r.outletPressure, {
    message: "inletPressure must exceed outletPressure",
    path: ["outletPressure"],
  });

export type SimulationRequest = z.infer<typeof simulationRequestSchema>;

/** Process conditions a run was resolved from, kept for its technical parameters. */
export interface StoredSimulation {
  request: SimulationRequest;
  properties: Record<string, unknown> | null;
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/**
 * Calculation runs: one row per pipeline invocation made through the API.
 * Stores the fully-defaulted parameter records next to the results so any
 * stored figure can be traced back to its inputs.
 */
export const calculationRuns = pgTable("calculation_runs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  mainPower: doublePrecision("main_power").notNull(),
  mainPowerSource: text("main_power_source").$type<MainPowerSource>().notNull(), // direct, simulation, estimate
  inputs: jsonb("inputs").$type<PipelineParams>().notNull(),
  results: jsonb("results").$type<CombinedResult>().notNull(),
  report: jsonb("report").$type<SelectionReport>().notNull(),
  simulation: jsonb("simulation").$type<StoredSimulation>(), // null for directly supplied shaft power
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertCalculationRunSchema = createInsertSchema(calculationRuns).omit({ id: true, createdAt: true });
export type InsertCalculationRun = typeof calculationRuns.$inferInsert;
export type CalculationRun = typeof calculationRuns.$inferSelect;

/**
 * Calculation config: stored overrides for the engineering defaults, one row
 * per parameter section (mainEngine, utility, economic, unitSelection).
 */
export const calculationConfig = pgTable("calculation_config", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  configKey: text("config_key").notNull().unique(),
  configValue: jsonb("config_value").$type<Record<string, unknown>>().notNull(),
  description: text("description"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const insertCalculationConfigSchema = createInsertSchema(calculationConfig).omit({ id: true, updatedAt: true });
export type InsertCalculationConfig = typeof calculationConfig.$inferInsert;
export type CalculationConfig = typeof calculationConfig.$inferSelect;
