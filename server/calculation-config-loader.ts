import {
  CONFIG_SECTIONS,
  parameterOverridesSchema,
  sectionOverrideSchemas,
  type ParameterOverrides,
} from "@shared/schema";
import type { IStorage } from "./storage";

const CACHE_TTL_MS = 30000;

export interface CalculationConfigLoader {
  getParameterOverrides(): Promise<ParameterOverrides>;
  invalidate(): void;
}

function emptyOverrides(): ParameterOverrides {
  return { mainEngine: {}, utility: {}, economic: {}, unitSelection: {} };
}

/**
 * Stored overrides for the engineering defaults, cached for CACHE_TTL_MS.
 * Stored values that no longer satisfy their section schema are skipped.
 */
export function createCalculationConfigLoader(
  storage: IStorage,
  now: () => number = Date.now,
): CalculationConfigLoader {
  let cached: ParameterOverrides = emptyOverrides();
  let cacheTimestamp = 0;
  let loaded = false;

  async function refresh(): Promise<void> {
    const allConfigs = await storage.getAllCalculationConfig();
    const stored: Record<string, unknown> = {};
    for (const c of allConfigs) {
      const section = CONFIG_SECTIONS.find((s) => s === c.configKey);
      if (!section) {
        console.warn(`Calculation config: unknown key "${c.configKey}", expected one of ${CONFIG_SECTIONS.join(", ")}`);
        continue;
      }
      if (sectionOverrideSchemas[section].safeParse(c.configValue).success) {
        stored[section] = c.configValue;
      } else {
        console.warn(`Calculation config: ignoring invalid stored value for "${c.configKey}"`);
      }
    }
    cached = parameterOverridesSchema.parse(stored);
  }

  return {
    async getParameterOverrides(): Promise<ParameterOverrides> {
      const current = now();
      if (!loaded || current - cacheTimestamp > CACHE_TTL_MS) {
        try {
          await refresh();
          loaded = true;
          cacheTimestamp = current;
        } catch (err) {
          console.error("Failed to load calculation config from storage, using last known values:", err);
        }
      }
      return cached;
    },

    invalidate(): void {
      loaded = false;
      cacheTimestamp = 0;
    },
  };
}
