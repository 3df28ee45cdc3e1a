import { describe, expect, it, vi } from "vitest";
import {
  ProvenanceInvariantViolationError,
  UniqueViolationError,
} from "../src/domain/errors.js";
import { IngestionSession } from "../src/domain/ingestionStore.js";
import { createSilentLogger } from "../src/infra/logging/logger.js";
import { InMemoryIngestionStore } from "../src/infra/store/inMemoryIngestionStore.js";
import { ProvenanceStore } from "../src/services/provenanceStore.js";

// A session whose lookups miss until an insert has "lost the race".
function createRacingSession(options: { winnerId: number | null }) {
  let conflicted = false;
  const session: IngestionSession = {
    findCopyrightHolderId: vi.fn(async () => (conflicted ? options.winnerId : null)),
    insertCopyrightHolder: vi.fn(async () => {
      conflicted = true;
      throw new UniqueViolationError("copyright_holders_name_key");
    }),
    findSourceId: vi.fn(async () => (conflicted ? options.winnerId : null)),
    insertSource: vi.fn(async () => {
      conflicted = true;
      throw new UniqueViolationError("sources_url_key");
    }),
    insertChunks: vi.fn(async () => {}),
    savepoint: vi.fn(async () => "sp_1"),
    rollbackToSavepoint: vi.fn(async () => {}),
    releaseSavepoint: vi.fn(async () => {}),
    commit: vi.fn(async () => {}),
    rollback: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
  };
  return session;
}

// Models row locks: an uncommitted insert is invisible to other sessions, and a
// second insert of the same name waits until the owner commits, then conflicts.
function createLockingDatabase() {
  const committed = new Map<string, number>();
  const pending = new Map<string, { owner: object; id: number; waiters: Array<() => void> }>();
  let nextId = 1;

  function openSession(): IngestionSession {
    const owner = {};
    return {
      findCopyrightHolderId: async (name) => {
        const row = pending.get(name);
        return committed.get(name) ?? (row?.owner === owner ? row.id : null);
      },
      insertCopyrightHolder: async (name) => {
        const row = pending.get(name);
        if (row && row.owner !== owner) {
          await new Promise<void>((resolve) => row.waiters.push(resolve));
        }
        if (committed.has(name)) {
          throw new UniqueViolationError("copyright_holders_name_key");
        }
        const id = nextId++;
        pending.set(name, { owner, id, waiters: [] });
        return id;
      },
      findSourceId: async () => null,
      insertSource: async () => nextId++,
      insertChunks: async () => {},
      savepoint: async () => "sp_1",
      rollbackToSavepoint: async () => {},
      releaseSavepoint: async () => {},
      commit: async () => {
        for (const [name, row] of pending) {
          if (row.owner === owner) {
            pending.delete(name);
            committed.set(name, row.id);
            row.waiters.forEach((wake) => wake());
          }
        }
      },
      rollback: async () => {},
      close: async () => {},
    };
  }

  return { openSession };
}

describe("ProvenanceStore", () => {
  it("returns the same id for repeated resolutions", async () => {
    const store = new InMemoryIngestionStore(3);
    const session = await store.openSession();
    const provenance = new ProvenanceStore(createSilentLogger());

    const first = await provenance.resolveCopyrightHolder(session, "Example Press");
    const second = await provenance.resolveCopyrightHolder(session, "Example Press");
    const sourceA = await provenance.resolveSource(session, first, "https://example.test/q/1");
    const sourceB = await provenance.resolveSource(session, first, "https://example.test/q/1");

    expect(second).toBe(first);
    expect(sourceB).toBe(sourceA);
    await expect(store.getStatistics()).resolves.toEqual({
      copyright_holders: 1,
      sources: 1,
      chunks: 0,
    });
  });

  it("creates exactly one record for concurrent resolutions", async () => {
    const store = new InMemoryIngestionStore(3);
    const session = await store.openSession();
    const provenance = new ProvenanceStore(createSilentLogger());

    const resolve = () => provenance.resolveCopyrightHolder(session, "Example Press");
    const ids = await Promise.all([resolve(), resolve(), resolve(), resolve(), resolve()]);

    expect(new Set(ids).size).toBe(1);
    await expect(store.getStatistics()).resolves.toMatchObject({ copyright_holders: 1 });
  });

  it("recovers a lost insert race by reading the winner's row", async () => {
    const session = createRacingSession({ winnerId: 42 });
    const provenance = new ProvenanceStore(createSilentLogger());

    await expect(provenance.resolveCopyrightHolder(session, "Example Press")).resolves.toBe(42);
    expect(session.rollbackToSavepoint).toHaveBeenCalledWith("sp_1");
    expect(session.releaseSavepoint).not.toHaveBeenCalled();
    expect(session.rollback).not.toHaveBeenCalled();
  });

  it("recovers source conflicts the same way", async () => {
    const session = createRacingSession({ winnerId: 7 });
    const provenance = new ProvenanceStore(createSilentLogger());

    await expect(provenance.resolveSource(session, 1, "https://example.test/q/1")).resolves.toBe(
      7,
    );
    expect(session.findSourceId).toHaveBeenCalledTimes(2);
  });

  it("fails loudly when the conflicting row cannot be found", async () => {
    const session = createRacingSession({ winnerId: null });
    const provenance = new ProvenanceStore(createSilentLogger());

    await expect(
      provenance.resolveCopyrightHolder(session, "Example Press"),
    ).rejects.toBeInstanceOf(ProvenanceInvariantViolationError);
  });

  it("passes other insert errors through", async () => {
    const session = createRacingSession({ winnerId: 1 });
    const failure = new Error("connection lost");
    vi.mocked(session.insertCopyrightHolder).mockRejectedValueOnce(failure);
    const provenance = new ProvenanceStore(createSilentLogger());

    await expect(provenance.resolveCopyrightHolder(session, "Example Press")).rejects.toBe(
      failure,
    );
    expect(session.findCopyrightHolderId).toHaveBeenCalledTimes(1);
  });

  it("lets one session commit while another waits on its uncommitted row", async () => {
    const database = createLockingDatabase();
    const first = database.openSession();
    const second = database.openSession();
    const provenance = new ProvenanceStore(createSilentLogger());

    const acme = await provenance.resolveCopyrightHolder(first, "Acme");
    const waiting = provenance.resolveCopyrightHolder(second, "Acme");
    const other = await provenance.resolveCopyrightHolder(first, "Other");
    await first.commit();

    await expect(waiting).resolves.toBe(acme);
    expect(other).not.toBe(acme);
  });
});
