#!/usr/bin/env node
import cron from "node-cron";
import { PipelineDeps, runPipeline } from "./scheduler";
import { createGmailClient, createGmailTransport } from "./services/gmail.service";
import { createNotionClient, createNotionStore } from "./services/notion.service";
import {
  createOpenAIClient,
  createOpenAILanguageService,
} from "./services/openai.service";
import { loadConfig } from "./utils/config";
import { logger, setLogLevel } from "./utils/logger";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info("Job mail reconciler starting up...");

  const store = createNotionStore(
    createNotionClient(config.notion),
    config.notion.databaseId
  );
  await store.verifySchema();

  const deps: PipelineDeps = {
    mail: createGmailTransport(
      createGmailClient(config.gmail).users.messages,
      config.gmail.query
    ),
    language: createOpenAILanguageService(
      createOpenAIClient(config.openai),
      config.openai
    ),
    store,
    confidenceThreshold: config.pipeline.confidenceThreshold,
  };

  await runPipeline(deps, config.pipeline.maxMessages);

  const schedule = config.cron.schedule;
  if (!schedule) return;

  // One writer at a time: a tick that lands during a run is dropped
  let running = false;
  logger.info(`Scheduling cron: ${schedule}`);
  cron.schedule(schedule, async () => {
    if (running) {
      logger.warn("Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    logger.info("Cron triggered - checking for new emails...");
    try {
      await runPipeline(deps, config.pipeline.maxMessages);
    } catch (error) {
      logger.error("Cron run failed", error);
    } finally {
      running = false;
    }
  });

  logger.info("Job mail reconciler is running. Press Ctrl+C to stop.");
}

main().catch((error) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
