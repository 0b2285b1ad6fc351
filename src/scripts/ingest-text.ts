import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { buildLawRagService } from "../app.js";
import { startClientLifecycle } from "../clients/lifecycle.js";
import { serializeError } from "../modules/errors.js";
import type { IngestRequest } from "../modules/service/schemas.js";
import { logError } from "../observability/logger.js";

const USAGE =
  "Usage: npm run ingest -- --country <code> --law-type <type> --law-name <name> [--law-number <n>] [--law-year <yyyy>] <file>...";

export interface IngestCliArguments {
  files: string[];
  country: string;
  lawType: string;
  lawName: string | undefined;
  lawNumber: string | undefined;
  lawYear: number | undefined;
}

export function parseIngestArguments(argv: string[]): IngestCliArguments {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      country: { type: "string" },
      "law-type": { type: "string" },
      "law-name": { type: "string" },
      "law-number": { type: "string" },
      "law-year": { type: "string" }
    }
  });

  if (positionals.length === 0 || !values.country || !values["law-type"]) {
    throw new Error(USAGE);
  }
  if (positionals.length > 1 && values["law-name"]) {
    throw new Error("--law-name applies to a single file; omit it to name each law after its file.");
  }

  const lawYear = values["law-year"] ? Number.parseInt(values["law-year"], 10) : undefined;
  return {
    files: positionals,
    country: values.country,
    lawType: values["law-type"],
    lawName: values["law-name"],
    lawNumber: values["law-number"],
    lawYear: Number.isNaN(lawYear) ? undefined : lawYear
  };
}

async function main(): Promise<void> {
  const args = parseIngestArguments(process.argv.slice(2));
  const lifecycle = await startClientLifecycle({ registerProcessSignals: false });
  try {
    const service = await buildLawRagService();
    const requests: IngestRequest[] = await Promise.all(
      args.files.map(async (file) => ({
        pdf_bytes: new Uint8Array(await readFile(file)),
        country: args.country,
        law_type: args.lawType,
        law_name: args.lawName ?? path.basename(file, path.extname(file)),
        source_file: path.basename(file),
        law_number: args.lawNumber ?? null,
        law_year: args.lawYear ?? null
      }))
    );
    const responses = await service.ingestMany(requests);
    console.log(JSON.stringify(responses, null, 2));
    if (responses.some((response) => !response.success)) {
      process.exitCode = 1;
    }
  } finally {
    await lifecycle.shutdown();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logError("scripts.ingest.failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
