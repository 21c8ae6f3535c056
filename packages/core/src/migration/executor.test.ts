import { describe, it, expect, vi } from "vitest";
import { createTierMigrationExecutor } from "./executor.js";
import type { MigrationRequest } from "./types.js";
import { PerObjectMigrationError } from "../errors/catalog.js";
import type { ObjectStoreProvider } from "../storage/adapters/interface.js";
import {
  createFakeObjectStore,
  makeMockLogger,
  makeRecord,
} from "../test-utils/fixtures.js";

const TO_HOT: MigrationRequest = { targetTier: "Hot", rehydratePriority: "High" };

function records(count: number) {
  return Array.from({ length: count }, (_, i) => makeRecord({ name: `blob-${i + 1}` }));
}

describe("TierMigrationExecutor.migrate", () => {
  it("migrates every record sequentially in order", async () => {
    const provider = createFakeObjectStore([]);
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });
    const batch = records(3);

    const result = await executor.migrate(batch, TO_HOT);

    expect(result.succeeded).toEqual(batch);
    expect(result.failed).toEqual([]);
    expect(result.notAttempted).toEqual([]);
    expect(provider.setTierCalls.map((c) => c.objectName)).toEqual([
      "blob-1",
      "blob-2",
      "blob-3",
    ]);
  });

  it("keeps going after a failure and reports exactly that object", async () => {
    const provider = createFakeObjectStore([]);
    const cause = new Error("409 BlobArchived");
    provider.failures.set("blob-3", cause);
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });
    const batch = records(5);

    const result = await executor.migrate(batch, TO_HOT);

    expect(provider.setTierCalls).toHaveLength(5);
    expect(result.succeeded.map((r) => r.name)).toEqual([
      "blob-1",
      "blob-2",
      "blob-4",
      "blob-5",
    ]);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0].record).toBe(batch[2]);
    expect(result.failed[0].error).toBeInstanceOf(PerObjectMigrationError);
    expect(result.failed[0].error.cause).toBe(cause);
    expect(result.failed[0].error.message).toBe(
      'Changing tier of "blob-3" failed: 409 BlobArchived',
    );
  });

  it("sends rehydrate priority only for objects leaving Archive", async () => {
    const provider = createFakeObjectStore([]);
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });

    await executor.migrate(
      [
        makeRecord({ name: "archived", tier: "Archive", versionId: "v7" }),
        makeRecord({ name: "cool", tier: "Cool" }),
      ],
      TO_HOT,
    );

    expect(provider.setTierCalls).toEqual([
      {
        container: "archive-logs",
        objectName: "archived",
        targetTier: "Hot",
        options: { rehydratePriority: "High", versionId: "v7" },
      },
      {
        container: "archive-logs",
        objectName: "cool",
        targetTier: "Hot",
        options: {},
      },
    ]);
  });

  it("reports progress after each object", async () => {
    const provider = createFakeObjectStore([]);
    provider.failures.set("blob-2", new Error("boom"));
    const logger = makeMockLogger();
    const executor = createTierMigrationExecutor({ provider, logger });
    const onProgress = vi.fn();

    await executor.migrate(records(3), TO_HOT, { onProgress });

    expect(onProgress.mock.calls.map(([p]) => [p.completed, p.total, p.ok])).toEqual([
      [1, 3, true],
      [2, 3, false],
      [3, 3, true],
    ]);
    expect(logger.error).toHaveBeenCalledWith(
      {
        name: "blob-2",
        progress: "2 / 3",
        error: 'Changing tier of "blob-2" failed: boom',
      },
      "Tier change failed",
    );
  });

  it("returns empty sets for an empty batch", async () => {
    const provider = createFakeObjectStore([]);
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });

    await expect(executor.migrate([], TO_HOT)).resolves.toEqual({
      succeeded: [],
      failed: [],
      notAttempted: [],
    });
  });

  it("stops scheduling once the signal aborts", async () => {
    const controller = new AbortController();
    const provider = createFakeObjectStore([]);
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });

    const result = await executor.migrate(records(4), TO_HOT, {
      signal: controller.signal,
      onProgress: ({ completed }) => {
        if (completed === 2) controller.abort();
      },
    });

    expect(result.succeeded.map((r) => r.name)).toEqual(["blob-1", "blob-2"]);
    expect(result.notAttempted.map((r) => r.name)).toEqual(["blob-3", "blob-4"]);
    expect(provider.setTierCalls).toHaveLength(2);
  });

  it("lets a request in flight at abort time settle and counts it as migrated", async () => {
    const controller = new AbortController();
    const applied: string[] = [];
    const provider: ObjectStoreProvider = {
      async *listObjects() {},
      setTier: vi.fn(async (_container: string, objectName: string) => {
        applied.push(objectName);
        controller.abort();
        await new Promise((resolve) => setImmediate(resolve));
      }),
    };
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });

    const result = await executor.migrate(records(3), TO_HOT, {
      signal: controller.signal,
    });

    expect(applied).toEqual(["blob-1"]);
    expect(result.succeeded.map((r) => r.name)).toEqual(["blob-1"]);
    expect(result.failed).toEqual([]);
    expect(result.notAttempted.map((r) => r.name)).toEqual(["blob-2", "blob-3"]);
    expect(provider.setTier).toHaveBeenCalledWith("archive-logs", "blob-1", "Hot", {
      rehydratePriority: "High",
    });
  });

  it("attempts nothing when already aborted", async () => {
    const provider = createFakeObjectStore([]);
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });

    const result = await executor.migrate(records(2), TO_HOT, {
      signal: AbortSignal.abort(),
    });

    expect(provider.setTierCalls).toEqual([]);
    expect(result.notAttempted).toHaveLength(2);
  });

  it("keeps result order deterministic with a worker pool", async () => {
    const releases: Array<() => void> = [];
    let started = 0;
    let inFlight = 0;
    let maxInFlight = 0;
    const provider: ObjectStoreProvider = {
      async *listObjects() {},
      setTier: vi.fn(async (_container: string, objectName: string) => {
        started++;
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise<void>((resolve) => releases.push(resolve));
        inFlight--;
        if (objectName === "blob-2") throw new Error("throttled");
      }),
    };
    const executor = createTierMigrationExecutor({ provider, logger: makeMockLogger() });

    const pending = executor.migrate(records(4), TO_HOT, { concurrency: 2 });
    // Release requests newest-first so completion order differs from input order.
    while (started < 4 || inFlight > 0) {
      await new Promise((resolve) => setImmediate(resolve));
      releases.pop()?.();
    }
    const result = await pending;

    expect(maxInFlight).toBe(2);
    expect(result.succeeded.map((r) => r.name)).toEqual(["blob-1", "blob-3", "blob-4"]);
    expect(result.failed.map((f) => f.record.name)).toEqual(["blob-2"]);
  });
});
