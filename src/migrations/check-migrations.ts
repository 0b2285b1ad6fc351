import { readdir } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { getPostgresClient } from "../clients/postgres.js";
import { describeError } from "../modules/errors.js";
import { defaultMigrationsDir, type MigrationQueryClient, SCHEMA_MIGRATIONS_DDL } from "./run-migrations.js";

export interface CheckMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: (directory: string) => Promise<string[]>;
  getPostgresClientFn?: () => Promise<{ pool: MigrationQueryClient }>;
}

const filenameOf = (row: unknown): string | null =>
  typeof row === "object" && row !== null && "filename" in row && typeof row.filename === "string"
    ? row.filename
    : null;

export async function assertMigrationsCurrent(dependencies: CheckMigrationsDependencies = {}): Promise<void> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const readdirFn = dependencies.readdirFn ?? readdir;
  const getPostgresClientFn = dependencies.getPostgresClientFn ?? getPostgresClient;
  const files = (await readdirFn(migrationsDir))
    .filter((name) => name.endsWith(".sql"))
    .sort();

  if (files.length === 0) {
    return;
  }

  const { pool } = await getPostgresClientFn();

  await pool.query(SCHEMA_MIGRATIONS_DDL);

  const appliedResult = await pool.query("SELECT filename FROM schema_migrations");
  const applied = new Set(appliedResult.rows.map(filenameOf));

  const pending = files.filter((file) => !applied.has(file));
  if (pending.length > 0) {
    throw new Error(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  assertMigrationsCurrent()
    .then(() => console.log("Migrations are up to date."))
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
