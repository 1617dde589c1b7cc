import {
  APPLICATION_STATUSES,
  ApplicationStatus,
  ExtractedFields,
  LanguageService,
  NotJobRelated,
  RawExtraction,
  RawMessage,
} from "../types";
import { parseCalendarDate, toIsoDate } from "../utils/date";
import { ExtractionIncompleteError } from "../utils/errors";
import { logger } from "../utils/logger";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

const MAX_BODY_CHARS = 3000;

// Values models put in place of a field they could not find
const PLACEHOLDERS = new Set([
  "unknown",
  "unknown company",
  "unknown position",
  "unknown role",
  "null",
  "none",
  "n/a",
  "na",
  "-",
]);

export interface ExtractorOptions {
  confidenceThreshold?: number;
}

export function isNotJobRelated(
  result: ExtractedFields | NotJobRelated
): result is NotJobRelated {
  return "kind" in result && result.kind === "not-job-related";
}

export async function extractFields(
  message: RawMessage,
  language: LanguageService,
  options: ExtractorOptions = {}
): Promise<ExtractedFields | NotJobRelated> {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const text = buildMessageText(message);

  const classification = await language.classify(text);
  logger.debug(`Classified "${message.subject}"`, classification);

  if (!classification.isJobRelated || classification.confidence < threshold) {
    return { kind: "not-job-related", confidence: classification.confidence };
  }

  const raw = await language.extract(text);
  return normalizeExtraction(raw, message.receivedAt);
}

export function buildMessageText(message: RawMessage): string {
  const body =
    message.body.length > MAX_BODY_CHARS
      ? `${message.body.slice(0, MAX_BODY_CHARS)}\n[... truncated ...]`
      : message.body;

  return `Subject: ${message.subject}
From: ${message.sender}
Received: ${toIsoDate(message.receivedAt)}

${body}`;
}

export function normalizeExtraction(
  raw: RawExtraction,
  receivedAt: Date
): ExtractedFields {
  const role = normalizeText(raw.role);
  const organization = normalizeText(raw.organization);

  const missing = [
    ...(role ? [] : ["role"]),
    ...(organization ? [] : ["organization"]),
  ];
  if (!role || !organization) {
    throw new ExtractionIncompleteError(
      `Extraction is missing ${missing.join(" and ")}`
    );
  }

  const fields: ExtractedFields = {
    role,
    organization,
    status: normalizeStatus(raw.status),
    applicationDate: parseCalendarDate(raw.date) ?? toIsoDate(receivedAt),
  };

  const link = normalizeLink(raw.jobDescriptionLink);
  if (link) fields.jobDescriptionLink = link;

  const notes = raw.notes?.trim();
  if (notes) fields.notes = notes;

  return fields;
}

/** Trims, collapses inner whitespace and rejects placeholder values. */
export function normalizeText(value: string | null | undefined): string | null {
  const text = value?.replace(/\s+/g, " ").trim();
  if (!text || PLACEHOLDERS.has(text.toLowerCase())) return null;
  return text;
}

/** Case-insensitive match against the known statuses; null when none fits. */
export function parseStatus(value: string | null | undefined): ApplicationStatus | null {
  const wanted = value?.trim().toLowerCase();
  return APPLICATION_STATUSES.find((status) => status.toLowerCase() === wanted) ?? null;
}

export function normalizeStatus(value: string | null | undefined): ApplicationStatus {
  return parseStatus(value) ?? "Applied";
}

export function normalizeLink(value: string | null | undefined): string | null {
  const text = value?.trim();
  if (!text) return null;
  try {
    const url = new URL(text);
    if (url.protocol !== "http:" && url.protocol !== "https:") return null;
    return url.toString();
  } catch {
    return null;
  }
}
