import { promises as fs } from "node:fs";
import path from "node:path";
import "dotenv/config";
import { createApplication } from "../src/app.js";
import { loadConfig } from "../src/config/env.js";
import { describeError } from "../src/infra/ai/retry.js";
import { isSupportedDocumentExtension } from "../src/infra/parsers/documentLoader.js";
import { configureLogger } from "../src/utils/logger.js";

interface CliOptions {
  directory: string;
  sourceType: string | undefined;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = configureLogger(config.logging);
  const app = await createApplication(config, logger);

  let ingested = 0;
  let failed = 0;
  try {
    const files = await collectFiles(path.resolve(options.directory));
    logger.info({ directory: options.directory, files: files.length }, "Ingesting directory");

    for (const file of files) {
      try {
        const result = await app.service.ingestFile(file, options.sourceType);
        ingested += 1;
        logger.info(
          { file, documentId: result.documentId, chunks: result.chunkCount },
          "Ingested file",
        );
      } catch (error) {
        failed += 1;
        logger.error({ file, error: describeError(error) }, "Failed to ingest file");
      }
    }
  } finally {
    await app.close();
  }

  logger.info({ ingested, failed }, "Directory ingestion finished");
  if (failed > 0) {
    process.exitCode = 1;
  }
}

function parseArgs(args: string[]): CliOptions {
  let directory: string | undefined;
  let sourceType: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--source-type") {
      sourceType = args[i + 1];
      i += 1;
    } else if (arg && !arg.startsWith("--")) {
      directory = arg;
    }
  }

  if (!directory) {
    throw new Error("Usage: tsx scripts/ingestDirectory.ts <dir> [--source-type <type>]");
  }
  return { directory, sourceType };
}

async function collectFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(fullPath)));
    } else if (entry.isFile() && isSupportedDocumentExtension(entry.name)) {
      files.push(fullPath);
    }
  }

  return files;
}

main().catch((error: unknown) => {
  console.error("Directory ingestion failed:", describeError(error));
  process.exit(1);
});
