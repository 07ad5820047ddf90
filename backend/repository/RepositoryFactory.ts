import type { AppConfig } from "../config";
import type { IntakeRepository } from "./IntakeRepository";
import { InMemoryIntakeRepository } from "./InMemoryIntakeRepository";
import { PostgresIntakeRepository } from "./PostgresIntakeRepository";

// Repository Factory
// - The ONLY place where the storage implementation is selected.
// - PostgreSQL when DATABASE_URL is set, otherwise in-memory.

export function createIntakeRepository(config: AppConfig): IntakeRepository {
  if (config.database.url) {
    console.log("[Intake] Using PostgreSQL repository");
    return new PostgresIntakeRepository();
  }
  console.log("[Intake] Using in-memory repository (no DATABASE_URL set)");
  return new InMemoryIntakeRepository();
}
