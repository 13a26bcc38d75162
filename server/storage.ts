import { randomUUID } from "crypto";
import { eq, desc } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import {
  calculationRuns,
  calculationConfig,
  type CalculationRun,
  type InsertCalculationRun,
  type CalculationConfig,
} from "@shared/schema";

export interface IStorage {
  // Calculation runs
  getAllCalculationRuns(): Promise<CalculationRun[]>;
  getCalculationRun(id: string): Promise<CalculationRun | undefined>;
  createCalculationRun(run: InsertCalculationRun): Promise<CalculationRun>;
  deleteCalculationRun(id: string): Promise<boolean>;

  // Calculation config
  getAllCalculationConfig(): Promise<CalculationConfig[]>;
  getCalculationConfig(configKey: string): Promise<CalculationConfig | undefined>;
  upsertCalculationConfig(
    configKey: string,
    configValue: Record<string, unknown>,
    description?: string | null,
  ): Promise<CalculationConfig>;
}

export class DatabaseStorage implements IStorage {
  private readonly db: NodePgDatabase;

  constructor(connectionString: string) {
    const pool = new pg.Pool({ connectionString });
    this.db = drizzle(pool);
  }

  // Calculation runs
  async getAllCalculationRuns(): Promise<CalculationRun[]> {
    return this.db.select().from(calculationRuns).orderBy(desc(calculationRuns.createdAt));
  }

  async getCalculationRun(id: string): Promise<CalculationRun | undefined> {
    const result = await this.db.select().from(calculationRuns).where(eq(calculationRuns.id, id));
    return result[0];
  }

  async createCalculationRun(run: InsertCalculationRun): Promise<CalculationRun> {
    const result = await this.db.insert(calculationRuns).values(run).returning();
    return result[0];
  }

  async deleteCalculationRun(id: string): Promise<boolean> {
    const result = await this.db
      .delete(calculationRuns)
      .where(eq(calculationRuns.id, id))
      .returning({ id: calculationRuns.id });
    return result.length > 0;
  }

  // Calculation config
  async getAllCalculationConfig(): Promise<CalculationConfig[]> {
    return this.db.select().from(calculationConfig).orderBy(calculationConfig.configKey);
  }

  async getCalculationConfig(configKey: string): Promise<CalculationConfig | undefined> {
    const result = await this.db.select().from(calculationConfig).where(eq(calculationConfig.configKey, configKey));
    return result[0];
  }

  async upsertCalculationConfig(
    configKey: string,
    configValue: Record<string, unknown>,
    description?: string | null,
  ): Promise<CalculationConfig> {
    const updatedAt = new Date();
    const result = await this.db
      .insert(calculationConfig)
      .values({ configKey, configValue, description: description ?? null, updatedAt })
      .onConflictDoUpdate({
        target: calculationConfig.configKey,
        set: description === undefined ? { configValue, updatedAt } : { configValue, description, updatedAt },
      })
      .returning();
    return result[0];
  }
}

/** Process-local storage used when no DATABASE_URL is configured, and by the tests. */
export class MemStorage implements IStorage {
  private runs = new Map<string, CalculationRun>();
  private config = new Map<string, CalculationConfig>();

  // Calculation runs
  async getAllCalculationRuns(): Promise<CalculationRun[]> {
    return Array.from(this.runs.values()).sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getCalculationRun(id: string): Promise<CalculationRun | undefined> {
    return this.runs.get(id);
  }

  async createCalculationRun(run: InsertCalculationRun): Promise<CalculationRun> {
    const created: CalculationRun = {
      ...run,
      id: run.id ?? randomUUID(),
      simulation: run.simulation ?? null,
      createdAt: run.createdAt ?? new Date(),
    };
    this.runs.set(created.id, created);
    return created;
  }

  async deleteCalculationRun(id: string): Promise<boolean> {
    return this.runs.delete(id);
  }

  // Calculation config
  async getAllCalculationConfig(): Promise<CalculationConfig[]> {
    return Array.from(this.config.values()).sort((a, b) => a.configKey.localeCompare(b.configKey));
  }

  async getCalculationConfig(configKey: string): Promise<CalculationConfig | undefined> {
    return this.config.get(configKey);
  }

  async upsertCalculationConfig(
    configKey: string,
    configValue: Record<string, unknown>,
    description?: string | null,
  ): Promise<CalculationConfig> {
    const existing = this.config.get(configKey);
    const saved: CalculationConfig = {
      id: existing?.id ?? randomUUID(),
      configKey,
      configValue,
      description: description === undefined ? existing?.description ?? null : description,
      updatedAt: new Date(),
    };
    this.config.set(configKey, saved);
    return saved;
  }
}

export function createStorage(databaseUrl: string | undefined = process.env.DATABASE_URL): IStorage {
  if (databaseUrl) {
    console.log("Storage: using PostgreSQL");
    return new DatabaseStorage(databaseUrl);
  }
  console.log("Storage: DATABASE_URL not set, using in-memory storage");
  return new MemStorage();
}
