import { beforeEach, describe, expect, it } from "vitest";
import {
  normalizeKeyPart,
  reconcile,
  sameApplication,
} from "../../src/services/reconciler.service";
import { ApplicationRecord, ExtractedFields } from "../../src/types";
import { StoreUnavailableError } from "../../src/utils/errors";
import { InMemoryStore } from "../helpers/fakes";

const applied: ExtractedFields = {
  role: "Backend Engineer",
  organization: "Acme",
  status: "Applied",
  applicationDate: "2026-03-02",
};

const existing: ApplicationRecord = {
  ...applied,
  id: "page-7",
  number: 7,
};

describe("reconcile", () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = new InMemoryStore();
  });

  it("creates a record when nothing matches", async () => {
    const action = await reconcile(applied, store);

    expect(action).toEqual({ type: "created", id: "page-1", number: 1 });
    expect(store.records).toEqual([{ ...applied, id: "page-1", number: 1 }]);
  });

  it("updates status and date in place when the status changed", async () => {
    store.seed(existing);

    const action = await reconcile(
      { ...applied, status: "Interview", applicationDate: "2026-03-10" },
      store
    );

    expect(action).toEqual({
      type: "updated",
      id: "page-7",
      number: 7,
      previousStatus: "Applied",
      status: "Interview",
    });
    expect(store.update).toHaveBeenCalledWith("page-7", {
      status: "Interview",
      applicationDate: "2026-03-10",
    });
    expect(store.records).toEqual([
      { ...existing, status: "Interview", applicationDate: "2026-03-10" },
    ]);
  });

  it("writes the status onto a record whose stored status is unknown", async () => {
    store.seed({ ...existing, status: null });

    const action = await reconcile(applied, store);

    expect(action).toEqual({
      type: "updated",
      id: "page-7",
      number: 7,
      previousStatus: null,
      status: "Applied",
    });
    expect(store.update).toHaveBeenCalledWith("page-7", {
      status: "Applied",
      applicationDate: "2026-03-02",
    });
  });

  it("writes a job link alongside a status change", async () => {
    store.seed(existing);

    await reconcile(
      {
        ...applied,
        status: "Rejected",
        jobDescriptionLink: "https://jobs.acme.test/42",
      },
      store
    );

    expect(store.update).toHaveBeenCalledWith("page-7", {
      status: "Rejected",
      applicationDate: "2026-03-02",
      jobDescriptionLink: "https://jobs.acme.test/42",
    });
  });

  it("skips without writing when role, organization and status all match", async () => {
    store.seed(existing);

    const action = await reconcile(applied, store);

    expect(action).toEqual({
      type: "skipped",
      id: "page-7",
      number: 7,
      reason: "status already Applied",
      refreshed: [],
    });
    expect(store.create).not.toHaveBeenCalled();
    expect(store.update).not.toHaveBeenCalled();
  });

  it("fills in an empty job link on a skip", async () => {
    store.seed(existing);

    const action = await reconcile(
      { ...applied, jobDescriptionLink: "https://jobs.acme.test/42" },
      store
    );

    expect(action).toMatchObject({ type: "skipped", refreshed: ["jobDescriptionLink"] });
    expect(store.update).toHaveBeenCalledWith("page-7", {
      jobDescriptionLink: "https://jobs.acme.test/42",
    });
  });

  it("leaves populated details alone on a skip", async () => {
    store.seed({
      ...existing,
      jobDescriptionLink: "https://jobs.acme.test/1",
      notes: "Referred by a friend",
    });

    const action = await reconcile(
      {
        ...applied,
        jobDescriptionLink: "https://jobs.acme.test/2",
        notes: "Portal confirmation",
      },
      store
    );

    expect(action).toMatchObject({ type: "skipped", refreshed: [] });
    expect(store.update).not.toHaveBeenCalled();
  });

  it("does not create a duplicate when the same candidate arrives twice", async () => {
    const first = await reconcile(applied, store);
    const second = await reconcile(applied, store);

    expect(first.type).toBe("created");
    expect(second.type).toBe("skipped");
    expect(store.records).toHaveLength(1);
  });

  it("matches the natural key ignoring case and spacing", async () => {
    store.seed(existing);

    const action = await reconcile(
      {
        ...applied,
        role: "  backend   ENGINEER ",
        organization: "acme",
        status: "Interview",
      },
      store
    );

    expect(action).toMatchObject({ type: "updated", id: "page-7" });
    expect(store.records).toHaveLength(1);
    expect(store.records[0].role).toBe("Backend Engineer");
    expect(store.records[0].organization).toBe("Acme");
  });

  it("never merges a different organization or a different role", async () => {
    store.seed(existing);

    const otherOrg = await reconcile({ ...applied, organization: "Acme Labs" }, store);
    const otherRole = await reconcile({ ...applied, role: "Frontend Engineer" }, store);

    expect(otherOrg).toEqual({ type: "created", id: "page-2", number: 2 });
    expect(otherRole).toEqual({ type: "created", id: "page-3", number: 3 });
    expect(store.records[0]).toEqual(existing);
  });

  it("creates once per pair and accepts backward transitions afterwards", async () => {
    const statuses = ["Applied", "Interview", "Rejected", "Applied"] as const;

    const types: string[] = [];
    for (const status of statuses) {
      const action = await reconcile({ ...applied, status }, store);
      types.push(action.type);
    }

    expect(types).toEqual(["created", "updated", "updated", "updated"]);
    expect(store.create).toHaveBeenCalledTimes(1);
    expect(store.records).toEqual([{ ...applied, id: "page-1", number: 1 }]);
  });

  it("surfaces a failed create as StoreUnavailableError", async () => {
    const cause = new Error("Notion down");
    store.create.mockRejectedValueOnce(cause);

    const result = reconcile(applied, store);

    await expect(result).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(result).rejects.toMatchObject({
      message: "Record store create failed for Backend Engineer at Acme",
      cause,
    });
  });

  it("surfaces a failed lookup as StoreUnavailableError", async () => {
    store.find.mockRejectedValueOnce(new Error("timeout"));

    await expect(reconcile(applied, store)).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(store.create).not.toHaveBeenCalled();
  });

  it("passes a StoreUnavailableError from the store through as is", async () => {
    const failure = new StoreUnavailableError("Notion update failed");
    store.seed(existing);
    store.update.mockRejectedValueOnce(failure);

    await expect(reconcile({ ...applied, status: "Interview" }, store)).rejects.toBe(failure);
  });
});

describe("natural key", () => {
  it("normalizes case and whitespace", () => {
    expect(normalizeKeyPart("  Senior\tBackend  Engineer ")).toBe("senior backend engineer");
  });

  it("requires both role and organization to match", () => {
    const a = { role: "Engineer", organization: "Acme" };

    expect(sameApplication(a, { role: "engineer", organization: " ACME" })).toBe(true);
    expect(sameApplication(a, { role: "Engineer", organization: "Globex" })).toBe(false);
    expect(sameApplication(a, { role: "Designer", organization: "Acme" })).toBe(false);
  });
});
