import { vi } from "vitest";
import type { Logger } from "pino";
import type { BlobRecord } from "../blobs/types.js";
import type {
  ObjectStoreProvider,
  RawObjectMetadata,
  SetTierOptions,
} from "../storage/adapters/interface.js";
import type { StorageTier } from "../schemas/migrator-config.js";

export function makeRecord(overrides?: Partial<BlobRecord>): BlobRecord {
  return {
    container: "archive-logs",
    name: "2024/04/app.log",
    tier: "Archive",
    lastModified: new Date("2024-04-10T12:00:00Z"),
    lastAccessed: null,
    contentLength: 2048,
    rehydrationStatus: "None",
    etag: '"0x8DC0000000000A"',
    tags: {},
    ...overrides,
  };
}

export function makeMockLogger(): Logger {
  const logger: Partial<Logger> = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
  };
  return logger as Logger;
}

export interface SetTierCall {
  container: string;
  objectName: string;
  targetTier: StorageTier;
  options?: SetTierOptions;
}

export interface FakeObjectStore extends ObjectStoreProvider {
  readonly setTierCalls: SetTierCall[];
  /** Names whose setTier call rejects with the mapped error. */
  readonly failures: Map<string, Error>;
  /** When set, listing throws after yielding this many objects. */
  listFailureAfter: number | null;
}

/** In-process object store holding a fixed listing. */
export function createFakeObjectStore(
  objects: RawObjectMetadata[],
): FakeObjectStore {
  const setTierCalls: SetTierCall[] = [];
  const failures = new Map<string, Error>();

  const store: FakeObjectStore = {
    setTierCalls,
    failures,
    listFailureAfter: null,

    async *listObjects(_container, filter) {
      let yielded = 0;
      for (const object of objects) {
        if (store.listFailureAfter !== null && yielded >= store.listFailureAfter) {
          throw new Error("AuthorizationPermissionMismatch");
        }
        if (filter?.tier && object.accessTier !== filter.tier) continue;
        yielded++;
        yield object;
      }
    },

    async setTier(container, objectName, targetTier, options) {
      setTierCalls.push({ container, objectName, targetTier, options });
      const failure = failures.get(objectName);
      if (failure) throw failure;
    },
  };
  return store;
}
