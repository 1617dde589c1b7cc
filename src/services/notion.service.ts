import { Client, isFullPage } from "@notionhq/client";
import type {
  CreatePageParameters,
  CreatePageResponse,
  GetDatabaseParameters,
  GetDatabaseResponse,
  PageObjectResponse,
  QueryDatabaseParameters,
  QueryDatabaseResponse,
  UpdatePageParameters,
  UpdatePageResponse,
} from "@notionhq/client/build/src/api-endpoints";
import {
  ApplicationRecord,
  ApplicationStore,
  ExtractedFields,
  RecordPatch,
} from "../types";
import { AppConfig } from "../utils/config";
import { ConfigurationError, StoreUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseStatus } from "./extractor.service";
import { sameApplication } from "./reconciler.service";

/** The Notion endpoints the store uses. `Client` satisfies it. */
export interface NotionDatabaseClient {
  databases: {
    query(args: QueryDatabaseParameters): Promise<QueryDatabaseResponse>;
    retrieve(args: GetDatabaseParameters): Promise<GetDatabaseResponse>;
  };
  pages: {
    create(args: CreatePageParameters): Promise<CreatePageResponse>;
    update(args: UpdatePageParameters): Promise<UpdatePageResponse>;
  };
}

export interface NotionApplicationStore extends ApplicationStore {
  verifySchema(): Promise<void>;
  nextNumber(): Promise<number>;
}

export const PROPERTY_TYPES = {
  Number: "number",
  Role: "title",
  Organization: "rich_text",
  "Job description": "url",
  Status: "select",
  Date: "date",
  Notes: "rich_text",
} as const;

// Notion rejects rich text content longer than this
const TEXT_LIMIT = 2000;

const PAGE_SIZE = 100;

type PageProperty = PageObjectResponse["properties"][string];
type QueryResult = QueryDatabaseResponse["results"][number];

export function createNotionClient(config: AppConfig["notion"]): Client {
  return new Client({ auth: config.token });
}

export function createNotionStore(
  notion: NotionDatabaseClient,
  databaseId: string
): NotionApplicationStore {
  async function call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new StoreUnavailableError(`Notion ${operation} failed`, {
        cause: error,
      });
    }
  }

  async function nextNumber(): Promise<number> {
    const response = await call("number lookup", () =>
      notion.databases.query({
        database_id: databaseId,
        sorts: [{ property: "Number", direction: "descending" }],
        page_size: 1,
      })
    );
    const last = response.results.filter(isPage).map(readRecord)[0];
    return last ? last.number + 1 : 1;
  }

  return {
    nextNumber,

    async find(role, organization) {
      // `contains` only narrows the candidates; sameApplication decides
      const filter: QueryDatabaseParameters["filter"] = {
        and: [
          { property: "Role", title: { contains: searchToken(role) } },
          {
            property: "Organization",
            rich_text: { contains: searchToken(organization) },
          },
        ],
      };

      let cursor: string | undefined;
      do {
        const startCursor = cursor;
        const response = await call("query", () =>
          notion.databases.query({
            database_id: databaseId,
            filter,
            page_size: PAGE_SIZE,
            start_cursor: startCursor,
          })
        );

        const match = response.results
          .filter(isPage)
          .map(readRecord)
          .find((record) => sameApplication(record, { role, organization }));
        if (match) return match;

        cursor = response.has_more ? response.next_cursor ?? undefined : undefined;
      } while (cursor);

      return null;
    },

    async create(fields) {
      const number = await nextNumber();
      const page = await call("create", () =>
        notion.pages.create({
          parent: { database_id: databaseId },
          properties: buildProperties(number, fields),
        })
      );
      return { ...fields, id: page.id, number };
    },

    async update(recordId, patch) {
      await call("update", () =>
        notion.pages.update({
          page_id: recordId,
          properties: buildPatchProperties(patch),
        })
      );
    },

    /**
     * Checks that every property exists with the expected type. Problems are
     * collected and reported together.
     */
    async verifySchema() {
      let db: GetDatabaseResponse;
      try {
        db = await notion.databases.retrieve({ database_id: databaseId });
      } catch (error) {
        throw new ConfigurationError(
          `Could not read Notion database ${databaseId}`,
          { cause: error }
        );
      }

      const problems: string[] = [];
      for (const [name, expected] of Object.entries(PROPERTY_TYPES)) {
        const property = db.properties[name];
        if (!property) {
          problems.push(`missing "${name}" (${expected})`);
        } else if (property.type !== expected) {
          problems.push(`"${name}" is ${property.type}, expected ${expected}`);
        }
      }

      if (problems.length > 0) {
        throw new ConfigurationError(
          `Notion database schema mismatch: ${problems.join("; ")}`
        );
      }

      logger.info("Notion database verified successfully");
    },
  };
}

export function buildProperties(
  number: number,
  fields: ExtractedFields
): CreatePageParameters["properties"] {
  return {
    Number: { number },
    Role: { title: [{ text: { content: clip(fields.role) } }] },
    Organization: {
      rich_text: [{ text: { content: clip(fields.organization) } }],
    },
    Status: { select: { name: fields.status } },
    Date: { date: { start: fields.applicationDate } },
    Notes: {
      rich_text: fields.notes ? [{ text: { content: clip(fields.notes) } }] : [],
    },
    ...(fields.jobDescriptionLink
      ? { "Job description": { url: fields.jobDescriptionLink } }
      : {}),
  };
}

export function buildPatchProperties(
  patch: RecordPatch
): UpdatePageParameters["properties"] {
  return {
    ...(patch.status ? { Status: { select: { name: patch.status } } } : {}),
    ...(patch.applicationDate
      ? { Date: { date: { start: patch.applicationDate } } }
      : {}),
    ...(patch.jobDescriptionLink
      ? { "Job description": { url: patch.jobDescriptionLink } }
      : {}),
    ...(patch.notes
      ? { Notes: { rich_text: [{ text: { content: clip(patch.notes) } }] } }
      : {}),
  };
}

export function readRecord(page: PageObjectResponse): ApplicationRecord {
  const props = page.properties;
  const record: ApplicationRecord = {
    id: page.id,
    number: readNumber(props.Number) ?? 0,
    role: readText(props.Role),
    organization: readText(props.Organization),
    status: parseStatus(readSelect(props.Status)),
    applicationDate: (readDate(props.Date) ?? "").slice(0, 10),
  };

  const link = readUrl(props["Job description"]);
  if (link) record.jobDescriptionLink = link;

  const notes = readText(props.Notes);
  if (notes) record.notes = notes;

  return record;
}

function isPage(result: QueryResult): result is PageObjectResponse {
  return result.object === "page" && isFullPage(result);
}

/**
 * Longest whitespace-free piece of a key part. Stored values with other
 * spacing still contain it, where they would not contain the whole phrase.
 */
export function searchToken(value: string): string {
  return value
    .split(/\s+/)
    .reduce((longest, token) => (token.length > longest.length ? token : longest), "");
}

function readNumber(prop: PageProperty | undefined): number | null {
  return prop?.type === "number" ? prop.number : null;
}

function readText(prop: PageProperty | undefined): string {
  if (prop?.type === "title") {
    return prop.title.map((item) => item.plain_text).join("");
  }
  if (prop?.type === "rich_text") {
    return prop.rich_text.map((item) => item.plain_text).join("");
  }
  return "";
}

function readSelect(prop: PageProperty | undefined): string | null {
  return prop?.type === "select" ? prop.select?.name ?? null : null;
}

function readDate(prop: PageProperty | undefined): string | null {
  return prop?.type === "date" ? prop.date?.start ?? null : null;
}

function readUrl(prop: PageProperty | undefined): string | null {
  return prop?.type === "url" ? prop.url : null;
}

function clip(text: string): string {
  return text.slice(0, TEXT_LIMIT);
}
