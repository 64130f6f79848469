import type { PipelineConfig } from "./config";
import process from "node:process";
import { assertEnv, logger } from "@sensemap/core";
import { parseArgs, USAGE } from "./args";
import { loadConfig } from "./config";
import { OpenAIEmbeddingProvider } from "./matching/embedding";
import { runFetchStage } from "./stages/01_fetch";
import { runExtractStage } from "./stages/02_extract";
import { runAssociateStage } from "./stages/03_associate";
import { runMatchStage } from "./stages/03_match";
import "colors";

async function fetchRaw(config: PipelineConfig) {
  const { io } = config;
  await runFetchStage({
    url: io.url,
    outputPath: io.rawPath,
    timeoutMs: io.timeoutMs,
    retries: io.retries,
    retryBaseDelayMs: io.retryBaseDelayMs,
    force: io.force,
  });
}

async function extract(config: PipelineConfig) {
  await runExtractStage({
    inputPath: config.io.rawPath,
    outputPath: config.io.interimPath,
    extract: config.extract,
    bufferSize: config.io.bufferSize,
  });
}

async function match(config: PipelineConfig) {
  assertEnv(["OPENAI_API_KEY"]);
  const row = await runMatchStage(
    {
      inputPath: config.io.interimPath,
      outputPath: config.io.outputPath,
      match: config.match,
      bufferSize: config.io.bufferSize,
    },
    new OpenAIEmbeddingProvider(config.embedding),
  );
  console.log(`Saved processed data to ${row.outputPath}`.green);
}

async function associate(config: PipelineConfig) {
  const row = await runAssociateStage({
    inputPath: config.io.interimPath,
    mappingsPath: config.io.mappingsPath,
    outputPath: config.io.associatedPath,
    bufferSize: config.io.bufferSize,
  });
  console.log(`Saved associated data to ${row.outputPath}`.green);
}

try {
  const { cmd, overrides } = parseArgs(process.argv.slice(2));
  const config = loadConfig(overrides);

  if (cmd === "fetch") {
    await fetchRaw(config);
  }
  else if (cmd === "extract") {
    await extract(config);
  }
  else if (cmd === "match") {
    await match(config);
  }
  else if (cmd === "associate") {
    await associate(config);
  }
  else if (cmd === "run") {
    await fetchRaw(config);
    await extract(config);
    await match(config);
  }
  else {
    process.stderr.write(USAGE);
    process.exit(1);
  }
}
catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`.red);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  process.exit(1);
}
