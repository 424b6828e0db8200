import { fileURLToPath } from "node:url";
import { parseEnv } from "@factvault/config";
import { AppError } from "@factvault/errors";
import { createLogger } from "@factvault/logger";
import { loadSeedDocuments } from "./loader.js";
import { createServices } from "./services.js";

const DEFAULT_SEED_FILE = fileURLToPath(new URL("../data/sample-documents.json", import.meta.url));

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "seed" });
  const services = createServices(config, logger);
  const file = process.argv[2] ?? DEFAULT_SEED_FILE;

  try {
    await services.store.ensureSchema();
    if (!(await services.store.healthCheck())) {
      throw new Error("documents table failed the setup check");
    }

    const documents = await loadSeedDocuments(file);
    logger.info({ file, documents: documents.length }, "seeding documents");

    const written = await services.documents.upsertBatch(documents);
    const total = await services.documents.count();
    logger.info({ written: written.length, total }, "seed complete");
  } finally {
    await services.close();
  }
}

main().catch((err: unknown) => {
  console.error("[seed] Fatal error:", AppError.isAppError(err) ? err.toJSON() : err);
  process.exit(1);
});
