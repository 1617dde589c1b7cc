import { extractFields, isNotJobRelated } from "./services/extractor.service";
import { reconcile } from "./services/reconciler.service";
import {
  ApplicationStore,
  LanguageService,
  MailTransport,
  MessageOutcome,
  FetchedMessages,
  RawMessage,
  RunSummary,
} from "./types";
import { ExtractionIncompleteError, describeError } from "./utils/errors";
import { logger } from "./utils/logger";

export interface PipelineDeps {
  mail: MailTransport;
  language: LanguageService;
  store: ApplicationStore;
  confidenceThreshold?: number;
}

export function emptySummary(): RunSummary {
  return { processed: 0, created: 0, updated: 0, skipped: 0, failed: 0 };
}

/** Folds one message outcome into the running summary. */
export function tally(summary: RunSummary, outcome: MessageOutcome): RunSummary {
  const next = { ...summary, processed: summary.processed + 1 };

  switch (outcome.kind) {
    case "not-job-related":
    case "incomplete":
      next.skipped++;
      break;
    case "failed":
      next.failed++;
      break;
    case "reconciled":
      if (outcome.action.type === "created") next.created++;
      else if (outcome.action.type === "updated") next.updated++;
      else next.skipped++;
      break;
  }

  return next;
}

/**
 * Runs one message through extraction and reconciliation. Only outcomes
 * other than "failed" are final; the message is marked read for those alone.
 */
export async function handleMessage(
  message: RawMessage,
  deps: PipelineDeps
): Promise<MessageOutcome> {
  let outcome: MessageOutcome;

  try {
    const extracted = await extractFields(message, deps.language, {
      confidenceThreshold: deps.confidenceThreshold,
    });

    if (isNotJobRelated(extracted)) {
      logger.info(`  → Not a job application email: "${message.subject}"`);
      outcome = { kind: "not-job-related" };
    } else {
      logger.info(
        `  → Extracted: ${extracted.role} at ${extracted.organization} (${extracted.status})`
      );
      const action = await reconcile(extracted, deps.store);
      outcome = { kind: "reconciled", action };
    }
  } catch (error) {
    if (error instanceof ExtractionIncompleteError) {
      logger.warn(`  → Skipping "${message.subject}": ${error.message}`);
      outcome = { kind: "incomplete", reason: error.message };
    } else {
      logger.error(`Failed to process email: "${message.subject}"`, error);
      return { kind: "failed", error };
    }
  }

  try {
    await deps.mail.markRead(message.id);
  } catch (error) {
    logger.error(`Failed to mark ${message.id} as read`, error);
    return { kind: "failed", error };
  }

  return outcome;
}

export async function runPipeline(
  deps: PipelineDeps,
  maxMessages: number
): Promise<RunSummary> {
  logger.info("Fetching unread emails...");

  let fetched: FetchedMessages;
  try {
    fetched = await deps.mail.fetchUnreadMessages(maxMessages);
  } catch (error) {
    logger.error("Failed to fetch emails from Gmail", error);
    throw error;
  }

  let summary = emptySummary();
  const { messages, unreadable } = fetched;

  if (messages.length === 0 && unreadable.length === 0) {
    logger.info("No unread emails found");
    return summary;
  }

  for (const { error } of unreadable) {
    summary = tally(summary, { kind: "failed", error });
  }

  for (const message of messages.slice(0, maxMessages)) {
    logger.info(`Processing: "${message.subject}"`);
    const outcome = await handleMessage(message, deps);
    if (outcome.kind === "failed") {
      logger.debug(`Left unread: ${describeError(outcome.error)}`);
    }
    summary = tally(summary, outcome);
  }

  logger.info(
    `Run complete: ${summary.processed} processed, ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped, ${summary.failed} failed`
  );
  return summary;
}
