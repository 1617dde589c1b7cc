import { google, gmail_v1 } from "googleapis";
import * as cheerio from "cheerio";
import {
  FetchedMessages,
  MailTransport,
  RawMessage,
  UnreadableMessage,
} from "../types";
import { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";

// Gmail caps a single list page at 500 ids
const MAX_PAGE_SIZE = 500;

/** The `users.messages` endpoints the transport calls. */
export interface GmailMessagesApi {
  list(
    params: gmail_v1.Params$Resource$Users$Messages$List
  ): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
  get(
    params: gmail_v1.Params$Resource$Users$Messages$Get
  ): Promise<{ data: gmail_v1.Schema$Message }>;
  modify(params: gmail_v1.Params$Resource$Users$Messages$Modify): Promise<unknown>;
}

export function createGmailClient(config: AppConfig["gmail"]): gmail_v1.Gmail {
  const oauth2Client = new google.auth.OAuth2(
    config.clientId,
    config.clientSecret,
    config.redirectUri
  );
  oauth2Client.setCredentials({ refresh_token: config.refreshToken });
  return google.gmail({ version: "v1", auth: oauth2Client });
}

export function createGmailTransport(
  messages: GmailMessagesApi,
  query = "is:unread"
): MailTransport {
  return {
    async fetchUnreadMessages(limit: number): Promise<FetchedMessages> {
      const ids = await listMessageIds(messages, query, limit);
      logger.info(`Found ${ids.length} unread message(s)`);

      const fetched: RawMessage[] = [];
      const unreadable: UnreadableMessage[] = [];
      for (const id of ids) {
        try {
          const response = await messages.get({
            userId: "me",
            id,
            format: "full",
          });
          fetched.push(toRawMessage(id, response.data));
        } catch (error) {
          // Left unread, so the next run sees it again
          logger.error(`Failed to read message ${id}`, error);
          unreadable.push({ id, error });
        }
      }
      return { messages: fetched, unreadable };
    },

    async markRead(messageId: string): Promise<void> {
      await messages.modify({
        userId: "me",
        id: messageId,
        requestBody: { removeLabelIds: ["UNREAD"] },
      });
      logger.debug(`Marked ${messageId} as read`);
    },
  };
}

async function listMessageIds(
  messages: GmailMessagesApi,
  query: string,
  limit: number
): Promise<string[]> {
  const ids: string[] = [];
  let pageToken: string | undefined;

  do {
    const response = await messages.list({
      userId: "me",
      q: query,
      maxResults: Math.min(limit - ids.length, MAX_PAGE_SIZE),
      pageToken,
    });

    for (const message of response.data.messages ?? []) {
      if (message.id && ids.length < limit) ids.push(message.id);
    }

    pageToken = response.data.nextPageToken ?? undefined;
  } while (pageToken && ids.length < limit);

  return ids;
}

export function toRawMessage(id: string, message: gmail_v1.Schema$Message): RawMessage {
  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string) =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ??
    "";

  const { text, html } = extractBody(message.payload);

  return {
    id,
    threadId: message.threadId || id,
    sender: getHeader("From"),
    subject: getHeader("Subject"),
    body: text.trim() ? text.trim() : stripHtml(html),
    receivedAt: receivedDate(getHeader("Date"), message.internalDate),
  };
}

function receivedDate(header: string, internalDate?: string | null): Date {
  const fromHeader = new Date(header);
  if (header && !Number.isNaN(fromHeader.getTime())) return fromHeader;

  const millis = Number(internalDate);
  if (internalDate && Number.isFinite(millis)) return new Date(millis);

  return new Date();
}

function extractBody(payload?: gmail_v1.Schema$MessagePart): {
  text: string;
  html: string;
} {
  let text = "";
  let html = "";

  if (!payload) return { text, html };

  if (payload.mimeType === "text/plain" && payload.body?.data) {
    text = decodeBase64(payload.body.data);
  } else if (payload.mimeType === "text/html" && payload.body?.data) {
    html = decodeBase64(payload.body.data);
  }

  for (const part of payload.parts ?? []) {
    const result = extractBody(part);
    if (!text && result.text) text = result.text;
    if (!html && result.html) html = result.html;
  }

  return { text, html };
}

function decodeBase64(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

export function stripHtml(html: string): string {
  if (!html) return "";
  const $ = cheerio.load(html);
  $("style, script").remove();
  return $("body").text().replace(/\s+/g, " ").trim();
}
