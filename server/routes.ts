/**
 * REST API routes for the power skid calculator.
 *
 * - Pipeline runs: resolve shaft power, apply parameter overrides, run the
 *   four calculation stages and store the run with its selection report
 * - Stored runs: list, fetch, delete and export as PDF or Excel
 * - Calculation config: stored overrides for the engineering defaults
 */
import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import {
  CONFIG_SECTIONS,
  insertCalculationRunSchema,
  insertCalculationConfigSchema,
  mainEngineOverridesSchema,
  utilityOverridesSchema,
  economicOverridesSchema,
  unitSelectionOverridesSchema,
  sectionOverrideSchemas,
  simulationRequestSchema,
  type MainPowerSource,
  type StoredSimulation,
} from "@shared/schema";
import type { IStorage } from "./storage";
import type { CalculationConfigLoader } from "./calculation-config-loader";
import { PowerCalculationError } from "./services/calculationErrors";
import { buildPipelineParams } from "./services/powerParams";
import { runPowerPipeline } from "./services/powerPipeline";
import { buildSelectionReport } from "./services/selectionReport";
import { resolveMainPower, type ShaftPowerSimulator } from "./services/shaftPowerSource";
import { exportCalculationPDF, exportCalculationExcel } from "./services/exportService";

export interface RouteDependencies {
  storage: IStorage;
  configLoader: CalculationConfigLoader;
  simulator?: ShaftPowerSimulator;
}

export const powerCalculationRequestSchema = insertCalculationRunSchema
  .pick({ name: true })
  .partial()
  .extend({
    mainPower: z.number().optional(),
    simulation: simulationRequestSchema.optional(),
    mainEngine: mainEngineOverridesSchema.optional(),
    utility: utilityOverridesSchema.optional(),
    economic: economicOverridesSchema.optional(),
    unitSelection: unitSelectionOverridesSchema.optional(),
  })
  .refine((body) => body.mainPower !== undefined || body.simulation !== undefined, {
    message: "Either mainPower or simulation is required",
    path: ["mainPower"],
  });

const configUpdateSchema = insertCalculationConfigSchema.pick({ description: true }).extend({
  configValue: z.record(z.unknown()),
});

/** Calculation failures are the caller's fault: a range, input or table problem. */
function sendCalculationError(res: Response, error: unknown, context: string): Response {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ error: error.errors });
  }
  if (error instanceof PowerCalculationError) {
    return res.status(422).json({ error: error.message, kind: error.kind });
  }
  console.error(`Error ${context}:`, error);
  return res.status(500).json({ error: `Failed ${context}` });
}

function safeFileName(name: string): string {
  return (name || "calculation").replace(/[^a-zA-Z0-9_-]/g, "_");
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  deps: RouteDependencies,
): Promise<Server> {
  const { storage, configLoader, simulator } = deps;

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", message: "Power skid calculator is running" });
  });

  // =========================================================================
  // Pipeline Runs
  // =========================================================================

  app.post("/api/power-calculation", async (req: Request, res: Response) => {
    try {
      const body = powerCalculationRequestSchema.parse(req.body);

      let mainPower: number;
      let mainPowerSource: MainPowerSource;
      let simulation: StoredSimulation | null = null;
      if (body.mainPower !== undefined) {
        mainPower = body.mainPower;
        mainPowerSource = "direct";
      } else if (body.simulation) {
        const resolved = await resolveMainPower(body.simulation, simulator);
        mainPower = resolved.mainPower;
        mainPowerSource = resolved.source;
        simulation = { request: body.simulation, properties: resolved.properties ?? null };
      } else {
        return res.status(400).json({ error: "Either mainPower or simulation is required" });
      }

      const storedOverrides = await configLoader.getParameterOverrides();
      const params = buildPipelineParams(mainPower, storedOverrides, {
        mainEngine: body.mainEngine,
        utility: body.utility,
        economic: body.economic,
        unitSelection: body.unitSelection,
      });

      const results = runPowerPipeline(params.mainEngine, params.utility, params.economic, params.unitSelection);
      const report = buildSelectionReport(results, params);

      const run = await storage.createCalculationRun({
        name: body.name ?? `Calculation ${mainPower.toFixed(1)} kW`,
        mainPower,
        mainPowerSource,
        inputs: params,
        results,
        report,
        simulation,
      });
      console.log(`Power Calc: stored run ${run.id} (${report.modelCode}, ${report.designType})`);
      res.status(201).json(run);
    } catch (error) {
      sendCalculationError(res, error, "running power calculation");
    }
  });

  app.get("/api/calculations", async (_req: Request, res: Response) => {
    try {
      const runs = await storage.getAllCalculationRuns();
      res.json(runs);
    } catch (error) {
      console.error("Error fetching calculations:", error);
      res.status(500).json({ error: "Failed to fetch calculations" });
    }
  });

  app.get("/api/calculations/:id", async (req: Request, res: Response) => {
    try {
      const run = await storage.getCalculationRun(req.params.id);
      if (!run) {
        return res.status(404).json({ error: "Calculation not found" });
      }
      res.json(run);
    } catch (error) {
      console.error("Error fetching calculation:", error);
      res.status(500).json({ error: "Failed to fetch calculation" });
    }
  });

  app.delete("/api/calculations/:id", async (req: Request, res: Response) => {
    try {
      const deleted = await storage.deleteCalculationRun(req.params.id);
      if (!deleted) {
        return res.status(404).json({ error: "Calculation not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting calculation:", error);
      res.status(500).json({ error: "Failed to delete calculation" });
    }
  });

  app.get("/api/calculations/:id/export-pdf", async (req: Request, res: Response) => {
    try {
      const run = await storage.getCalculationRun(req.params.id);
      if (!run) return res.status(404).json({ error: "Calculation not found" });
      const pdfBuffer = await exportCalculationPDF(run);
      res.set({
        "Content-Type": "application/pdf",
        "Content-Disposition": `attachment; filename="PowerSkid-${safeFileName(run.name)}.pdf"`,
        "Content-Length": pdfBuffer.length.toString(),
      });
      res.send(pdfBuffer);
    } catch (error) {
      console.error("Error exporting calculation PDF:", error);
      res.status(500).json({ error: "Failed to export calculation PDF" });
    }
  });

  app.get("/api/calculations/:id/export-excel", async (req: Request, res: Response) => {
    try {
      const run = await storage.getCalculationRun(req.params.id);
      if (!run) return res.status(404).json({ error: "Calculation not found" });
      const xlsxBuffer = await exportCalculationExcel(run);
      res.set({
        "Content-Type": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        "Content-Disposition": `attachment; filename="PowerSkid-${safeFileName(run.name)}.xlsx"`,
        "Content-Length": xlsxBuffer.length.toString(),
      });
      res.send(xlsxBuffer);
    } catch (error) {
      console.error("Error exporting calculation Excel:", error);
      res.status(500).json({ error: "Failed to export calculation Excel" });
    }
  });

  // =========================================================================
  // Calculation Config
  // =========================================================================

  app.get("/api/calculation-config", async (_req: Request, res: Response) => {
    try {
      const configs = await storage.getAllCalculationConfig();
      res.json(configs);
    } catch (error) {
      console.error("Error fetching calculation config:", error);
      res.status(500).json({ error: "Failed to fetch calculation config" });
    }
  });

  app.patch("/api/calculation-config/:key", async (req: Request, res: Response) => {
    try {
      const section = CONFIG_SECTIONS.find((s) => s === req.params.key);
      if (!section) {
        return res.status(400).json({
          error: `Unknown config key "${req.params.key}", expected one of ${CONFIG_SECTIONS.join(", ")}`,
        });
      }
      const { configValue, description } = configUpdateSchema.parse(req.body);
      const value = sectionOverrideSchemas[section].parse(configValue);
      const updated = await storage.upsertCalculationConfig(section, value, description);
      configLoader.invalidate();
      console.log(`Calculation config: updated "${section}"`);
      res.json(updated);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: error.errors });
      }
      console.error("Error updating calculation config:", error);
      res.status(500).json({ error: "Failed to update calculation config" });
    }
  });

  return httpServer;
}
