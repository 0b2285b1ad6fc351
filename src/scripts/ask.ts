import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { buildLawRagService } from "../app.js";
import { startClientLifecycle } from "../clients/lifecycle.js";
import { serializeError } from "../modules/errors.js";
import { logError } from "../observability/logger.js";

const USAGE = "Usage: npm run ask -- --country <code> [--session <id>] [--top-k <n>] [--law-type <type>]... <question>";

export interface AskCliArguments {
  question: string;
  country: string;
  sessionId: string | undefined;
  topK: number | undefined;
  lawTypes: string[] | undefined;
}

export function parseAskArguments(argv: string[]): AskCliArguments {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      country: { type: "string" },
      session: { type: "string" },
      "top-k": { type: "string" },
      "law-type": { type: "string", multiple: true }
    }
  });

  const question = positionals.join(" ").trim();
  if (!question || !values.country) {
    throw new Error(USAGE);
  }

  const topK = values["top-k"] ? Number.parseInt(values["top-k"], 10) : undefined;
  return {
    question,
    country: values.country,
    sessionId: values.session,
    topK: Number.isNaN(topK) ? undefined : topK,
    lawTypes: values["law-type"]
  };
}

async function main(): Promise<void> {
  const args = parseAskArguments(process.argv.slice(2));
  const lifecycle = await startClientLifecycle({ registerProcessSignals: false });
  try {
    const service = await buildLawRagService();
    const result = await service.query({
      question: args.question,
      country: args.country,
      session_id: args.sessionId,
      top_k: args.topK,
      law_types: args.lawTypes
    });
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await lifecycle.shutdown();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logError("scripts.ask.failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
