import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { withTransaction } from "../clients/postgres.js";
import { logError, logInfo } from "../observability/logger.js";
import { serializeError } from "../modules/errors.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

export interface MigrationQueryClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface RunMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: (directory: string) => Promise<string[]>;
  readFileFn?: (filePath: string, encoding: "utf8") => Promise<string>;
  withTransactionFn?: <T>(operation: (client: MigrationQueryClient) => Promise<T>) => Promise<T>;
}

export const SCHEMA_MIGRATIONS_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

const isAppliedRow = (row: unknown): boolean =>
  typeof row === "object" && row !== null && "exists" in row && row.exists === true;

export async function runMigrations(dependencies: RunMigrationsDependencies = {}): Promise<string[]> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const readdirFn = dependencies.readdirFn ?? readdir;
  const readFileFn = dependencies.readFileFn ?? readFile;
  const withTransactionFn = dependencies.withTransactionFn ?? withTransaction;

  const filenames = (await readdirFn(migrationsDir))
    .filter((name) => name.endsWith(".sql"))
    .sort();

  if (filenames.length === 0) {
    return [];
  }

  await withTransactionFn(async (client) => {
    await client.query(SCHEMA_MIGRATIONS_DDL);
  });

  const applied: string[] = [];

  for (const filename of filenames) {
    const alreadyApplied = await withTransactionFn(async (client) => {
      const result = await client.query(
        "SELECT EXISTS(SELECT 1 FROM schema_migrations WHERE filename = $1) AS exists",
        [filename]
      );
      return isAppliedRow(result.rows[0]);
    });

    if (alreadyApplied) {
      continue;
    }

    const migrationSql = (await readFileFn(path.join(migrationsDir, filename), "utf8")).replace(/^\uFEFF/, "");

    await withTransactionFn(async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });

    logInfo("migrations.applied", {}, { filename });
    applied.push(filename);
  }

  return applied;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then((applied) => {
      if (applied.length === 0) {
        console.log("No pending migrations.");
      } else {
        console.log(`Applied migrations: ${applied.join(", ")}`);
      }
    })
    .catch((error: unknown) => {
      logError("migrations.failed", {}, serializeError(error));
      process.exitCode = 1;
    });
}
