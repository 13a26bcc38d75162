import { describe, it, expect } from "vitest";
import { MemStorage } from "../storage";
import { buildPipelineParams } from "../services/powerParams";
import { runPowerPipeline } from "../services/powerPipeline";
import { buildSelectionReport } from "../services/selectionReport";
import type { InsertCalculationRun } from "@shared/schema";

function insertRun(name: string, createdAt: Date): InsertCalculationRun {
  const params = buildPipelineParams(500);
  const results = runPowerPipeline(params.mainEngine, params.utility, params.economic, params.unitSelection);
  return {
    name,
    mainPower: 500,
    mainPowerSource: "direct",
    inputs: params,
    results,
    report: buildSelectionReport(results, params),
    createdAt,
  };
}

describe("MemStorage", () => {
  describe("calculation runs", () => {
    it("assigns ids and lists newest first", async () => {
      const storage = new MemStorage();
      const older = await storage.createCalculationRun(insertRun("older", new Date("2024-01-01T00:00:00Z")));
      const newer = await storage.createCalculationRun(insertRun("newer", new Date("2024-02-01T00:00:00Z")));
      expect(older.id).not.toBe(newer.id);
      const all = await storage.getAllCalculationRuns();
      expect(all.map((r) => r.name)).toEqual(["newer", "older"]);
    });

    it("fetches and deletes by id", async () => {
      const storage = new MemStorage();
      const run = await storage.createCalculationRun(insertRun("only", new Date()));
      expect((await storage.getCalculationRun(run.id))?.name).toBe("only");
      expect(await storage.deleteCalculationRun(run.id)).toBe(true);
      expect(await storage.deleteCalculationRun(run.id)).toBe(false);
      expect(await storage.getCalculationRun(run.id)).toBeUndefined();
    });
  });

  describe("calculation config", () => {
    it("upserts by key and keeps the description unless replaced", async () => {
      const storage = new MemStorage();
      const first = await storage.upsertCalculationConfig("economic", { electricityPrice: 0.7 }, "Regional tariff");
      const second = await storage.upsertCalculationConfig("economic", { electricityPrice: 0.8 });
      expect(second.id).toBe(first.id);
      expect(second.configValue).toEqual({ electricityPrice: 0.8 });
      expect(second.description).toBe("Regional tariff");

      const cleared = await storage.upsertCalculationConfig("economic", { electricityPrice: 0.8 }, null);
      expect(cleared.description).toBeNull();
    });

    it("lists entries sorted by key", async () => {
      const storage = new MemStorage();
      await storage.upsertCalculationConfig("utility", {});
      await storage.upsertCalculationConfig("economic", {});
      const all = await storage.getAllCalculationConfig();
      expect(all.map((c) => c.configKey)).toEqual(["economic", "utility"]);
    });
  });
});
