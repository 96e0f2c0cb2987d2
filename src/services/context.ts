import { env } from "../config/env.js";
import { defaultClassificationRules } from "../domain/categorization/defaults.js";
import type { ClassificationRuleSet } from "../domain/categorization/types.js";
import { defaultRulesetSource, loadEngineRulesets } from "../domain/rulesets/loader.js";
import type { RulesetSource } from "../domain/rulesets/loader.js";
import type { EngineRulesets } from "../domain/rulesets/types.js";
import { InMemoryNexusStore } from "../domain/sales-tax/nexus.js";
import type { NexusStore } from "../domain/sales-tax/nexus.js";
import { openDatabase } from "../infrastructure/database.js";
import type { SqliteDatabase } from "../infrastructure/database.js";
import { logger as rootLogger } from "../infrastructure/logger.js";
import type { Logger } from "../infrastructure/logger.js";
import { SqliteNexusStore } from "../infrastructure/sqlite-nexus-store.js";

/** Everything a service call needs, passed explicitly instead of read from module state. */
export interface EngineContext {
  db: SqliteDatabase;
  logger: Logger;
  nexusStore: NexusStore;
  classificationRules: ClassificationRuleSet;
  rulesetsFor(taxYear: number): EngineRulesets;
  clock(): Date;
}

export interface EngineContextOptions {
  db?: SqliteDatabase;
  logger?: Logger;
  nexusStore?: NexusStore;
  classificationRules?: ClassificationRuleSet;
  rulesetSource?: RulesetSource;
  clock?: () => Date;
}

export function createEngineContext(options: EngineContextOptions = {}): EngineContext {
  const db = options.db ?? openDatabase();
  const source = options.rulesetSource ?? defaultRulesetSource();
  const compiled = new Map<number, EngineRulesets>();

  return {
    db,
    logger: options.logger ?? rootLogger,
    nexusStore: options.nexusStore ?? (env.NEXUS_STORE === "memory" ? new InMemoryNexusStore() : new SqliteNexusStore(db)),
    classificationRules: options.classificationRules ?? defaultClassificationRules,
    rulesetsFor(taxYear) {
      const cached = compiled.get(taxYear);
      if (cached) {
        return cached;
      }
      const rulesets = loadEngineRulesets(taxYear, source);
      compiled.set(taxYear, rulesets);
      return rulesets;
    },
    clock: options.clock ?? (() => new Date())
  };
}
