import {
  ApplicationRecord,
  ApplicationStore,
  DetailField,
  ExtractedFields,
  ReconcileAction,
  RecordPatch,
} from "../types";
import { StoreUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";

/** Case-insensitive, whitespace-collapsed form of a natural key part. */
export function normalizeKeyPart(value: string): string {
  return value.replace(/\s+/g, " ").trim().toLowerCase();
}

export function sameApplication(
  a: Pick<ExtractedFields, "role" | "organization">,
  b: Pick<ExtractedFields, "role" | "organization">
): boolean {
  return (
    normalizeKeyPart(a.role) === normalizeKeyPart(b.role) &&
    normalizeKeyPart(a.organization) === normalizeKeyPart(b.organization)
  );
}

/**
 * Matches a candidate against the store by (role, organization) and decides
 * between create, update and skip. Status changes are taken as they come,
 * including ones that look backward such as Interview → Applied. A record
 * whose stored status is unknown always takes the extracted one.
 */
export async function reconcile(
  fields: ExtractedFields,
  store: ApplicationStore
): Promise<ReconcileAction> {
  const existing = await storeCall("look up", fields, () =>
    store.find(fields.role, fields.organization)
  );

  if (!existing) {
    const created = await storeCall("create", fields, () => store.create(fields));
    logger.info(
      `Created record #${created.number}: ${fields.role} at ${fields.organization} (${fields.status})`
    );
    return { type: "created", id: created.id, number: created.number };
  }

  if (existing.status === fields.status) {
    const patch = detailRefresh(existing, fields);
    const refreshed = Object.keys(patch).filter(isDetailField);

    if (refreshed.length > 0) {
      await storeCall("refresh", fields, () => store.update(existing.id, patch));
      logger.info(
        `Refreshed ${refreshed.join(", ")} on record #${existing.number}`
      );
    }

    return {
      type: "skipped",
      id: existing.id,
      number: existing.number,
      reason: `status already ${existing.status}`,
      refreshed,
    };
  }

  const patch: RecordPatch = {
    status: fields.status,
    applicationDate: fields.applicationDate,
  };
  if (fields.jobDescriptionLink) {
    patch.jobDescriptionLink = fields.jobDescriptionLink;
  }

  await storeCall("update", fields, () => store.update(existing.id, patch));
  logger.info(
    `Updated record #${existing.number}: ${existing.role} at ${existing.organization} ${existing.status ?? "(no status)"} → ${fields.status}`
  );

  return {
    type: "updated",
    id: existing.id,
    number: existing.number,
    previousStatus: existing.status,
    status: fields.status,
  };
}

function detailRefresh(
  existing: ApplicationRecord,
  fields: ExtractedFields
): RecordPatch {
  const patch: RecordPatch = {};
  if (!existing.jobDescriptionLink && fields.jobDescriptionLink) {
    patch.jobDescriptionLink = fields.jobDescriptionLink;
  }
  if (!existing.notes && fields.notes) {
    patch.notes = fields.notes;
  }
  return patch;
}

function isDetailField(key: string): key is DetailField {
  return key === "jobDescriptionLink" || key === "notes";
}

async function storeCall<T>(
  operation: string,
  fields: ExtractedFields,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof StoreUnavailableError) throw error;
    throw new StoreUnavailableError(
      `Record store ${operation} failed for ${fields.role} at ${fields.organization}`,
      { cause: error }
    );
  }
}
