import { describe, expect, it, vi } from "vitest";
import {
  createGmailTransport,
  stripHtml,
  toRawMessage,
} from "../../src/services/gmail.service";

const encode = (text: string) => Buffer.from(text, "utf-8").toString("base64url");

describe("toRawMessage", () => {
  it("prefers the plain text part and reads headers case-insensitively", () => {
    const raw = toRawMessage("abc", {
      threadId: "thread-9",
      payload: {
        mimeType: "multipart/alternative",
        headers: [
          { name: "subject", value: "Interview invitation" },
          { name: "From", value: "Acme Talent <talent@acme.test>" },
          { name: "DATE", value: "Mon, 02 Mar 2026 10:00:00 +0000" },
        ],
        parts: [
          { mimeType: "text/plain", body: { data: encode("Hello there\n") } },
          { mimeType: "text/html", body: { data: encode("<p>Hello there</p>") } },
        ],
      },
    });

    expect(raw).toEqual({
      id: "abc",
      threadId: "thread-9",
      sender: "Acme Talent <talent@acme.test>",
      subject: "Interview invitation",
      body: "Hello there",
      receivedAt: new Date("2026-03-02T10:00:00.000Z"),
    });
  });

  it("falls back to stripped HTML when there is no text part", () => {
    const html =
      "<html><head><style>p { color: red; }</style></head><body><p>Thank  you</p>\n<script>track()</script><p>for applying</p></body></html>";

    const raw = toRawMessage("abc", {
      payload: {
        mimeType: "multipart/mixed",
        parts: [
          {
            mimeType: "multipart/alternative",
            parts: [{ mimeType: "text/html", body: { data: encode(html) } }],
          },
        ],
      },
    });

    expect(raw.body).toBe("Thank you for applying");
  });

  it("uses internalDate when the Date header is missing or invalid", () => {
    const raw = toRawMessage("abc", {
      internalDate: "1772445600000",
      payload: { headers: [{ name: "Date", value: "sometime" }] },
    });

    expect(raw.receivedAt.getTime()).toBe(1772445600000);
  });

  it("uses the message id as thread id when Gmail gives none", () => {
    expect(toRawMessage("abc", {}).threadId).toBe("abc");
  });
});

describe("stripHtml", () => {
  it("returns an empty string for empty input", () => {
    expect(stripHtml("")).toBe("");
  });
});

describe("createGmailTransport", () => {
  function fakeMessages() {
    return { list: vi.fn(), get: vi.fn(), modify: vi.fn() };
  }

  function fullMessage(id: string) {
    return {
      data: {
        id,
        threadId: `t-${id}`,
        payload: {
          mimeType: "text/plain",
          headers: [
            { name: "Subject", value: `Subject ${id}` },
            { name: "Date", value: "Mon, 02 Mar 2026 10:00:00 +0000" },
          ],
          body: { data: encode(`Body ${id}`) },
        },
      },
    };
  }

  it("pages through unread ids up to the limit and keeps their order", async () => {
    const messages = fakeMessages();
    messages.list
      .mockResolvedValueOnce({ data: { messages: [{ id: "a" }, { id: "b" }], nextPageToken: "next" } })
      .mockResolvedValueOnce({ data: { messages: [{ id: "c" }, { id: "d" }] } });
    messages.get.mockImplementation(async ({ id }) => fullMessage(id));
    const transport = createGmailTransport(messages, "is:unread in:inbox");

    const fetched = await transport.fetchUnreadMessages(3);

    expect(fetched.unreadable).toEqual([]);
    expect(fetched.messages.map((m) => [m.id, m.subject, m.body])).toEqual([
      ["a", "Subject a", "Body a"],
      ["b", "Subject b", "Body b"],
      ["c", "Subject c", "Body c"],
    ]);
    expect(messages.list).toHaveBeenNthCalledWith(1, {
      userId: "me",
      q: "is:unread in:inbox",
      maxResults: 3,
      pageToken: undefined,
    });
    expect(messages.list).toHaveBeenNthCalledWith(2, {
      userId: "me",
      q: "is:unread in:inbox",
      maxResults: 1,
      pageToken: "next",
    });
  });

  it("reports messages that cannot be read instead of returning them", async () => {
    const messages = fakeMessages();
    const notFound = new Error("404");
    messages.list.mockResolvedValueOnce({ data: { messages: [{ id: "a" }, { id: "b" }] } });
    messages.get.mockImplementation(async ({ id }) => {
      if (id === "a") throw notFound;
      return fullMessage(id);
    });
    const transport = createGmailTransport(messages);

    const fetched = await transport.fetchUnreadMessages(10);

    expect(fetched.messages.map((m) => m.id)).toEqual(["b"]);
    expect(fetched.unreadable).toEqual([{ id: "a", error: notFound }]);
  });

  it("lets a listing failure propagate", async () => {
    const messages = fakeMessages();
    messages.list.mockRejectedValueOnce(new Error("invalid_grant"));
    const transport = createGmailTransport(messages);

    await expect(transport.fetchUnreadMessages(10)).rejects.toThrow("invalid_grant");
    expect(messages.get).not.toHaveBeenCalled();
  });

  it("marks a message read by removing the UNREAD label", async () => {
    const messages = fakeMessages();
    messages.modify.mockResolvedValueOnce({ data: {} });
    const transport = createGmailTransport(messages);

    await transport.markRead("a");

    expect(messages.modify).toHaveBeenCalledWith({
      userId: "me",
      id: "a",
      requestBody: { removeLabelIds: ["UNREAD"] },
    });
  });
});
