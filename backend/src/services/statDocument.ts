import { err, ok, type Result } from "./result";
import type { StatKind, StatUpsert, StatValue } from "./remoteStatClient";

export const MAX_STAT_NAME_LENGTH = 63;
export const MAX_STAT_STRING_LENGTH = 63;

export type StatSnapshot = Readonly<{
  name: string;
  value: StatValue;
  dirty: boolean;
}>;

/** What a flush sent, with the revision of every entry at the time it was taken. */
export type PendingFlush = Readonly<{
  upserts: ReadonlyArray<StatUpsert>;
  deletes: ReadonlyArray<string>;
  revisions: ReadonlyMap<string, number>;
}>;

export type StatDocument = Readonly<{
  set(name: string, value: StatValue): Result<void>;
  get(name: string): Result<StatSnapshot>;
  names(): ReadonlyArray<string>;
  delete(name: string): Result<void>;
  isDirty(): boolean;
  takePending(): PendingFlush;
  acknowledge(flush: PendingFlush): void;
}>;

type Entry = {
  value: StatValue;
  dirty: boolean;
  revision: number;
};

export function validateStatName(name: unknown): Result<string> {
  if (typeof name !== "string" || name.trim() === "") {
    return err("INVALID_STAT_NAME", "Stat name is required.");
  }
  if (name.length > MAX_STAT_NAME_LENGTH) {
    return err("INVALID_STAT_NAME", "Stat name is too long.", { maxLength: MAX_STAT_NAME_LENGTH });
  }
  return ok(name);
}

function describeKind(kind: StatKind): string {
  return kind === "number" ? "a number" : "a string";
}

export function createStatDocument(): StatDocument {
  const entries = new Map<string, Entry>();
  // Deleted names still owed to the remote side, keyed to the revision of the delete.
  const pendingDeletes = new Map<string, number>();
  let revisionCounter = 0;

  function nextRevision(): number {
    revisionCounter += 1;
    return revisionCounter;
  }

  return {
    set(name: string, value: StatValue): Result<void> {
      const validName = validateStatName(name);
      if (!validName.ok) return validName;

      if (value.kind === "number" && !Number.isFinite(value.value)) {
        return err("INVALID_STAT_VALUE", "Stat value must be a finite number.", { name });
      }
      if (value.kind === "string" && value.value.length > MAX_STAT_STRING_LENGTH) {
        return err("VALUE_TOO_LONG", "Stat value is too long.", { name, maxLength: MAX_STAT_STRING_LENGTH });
      }

      const existing = entries.get(name);
      if (existing && existing.value.kind !== value.kind) {
        return err("TYPE_MISMATCH", `Stat "${name}" is ${describeKind(existing.value.kind)}.`, {
          name,
          expected: existing.value.kind,
          actual: value.kind
        });
      }

      pendingDeletes.delete(name);
      entries.set(name, { value, dirty: true, revision: nextRevision() });
      return ok(undefined);
    },

    get(name: string): Result<StatSnapshot> {
      const entry = entries.get(name);
      if (!entry) return err("STAT_NOT_FOUND", `Stat "${name}" not found.`, { name });
      return ok({ name, value: entry.value, dirty: entry.dirty });
    },

    names(): ReadonlyArray<string> {
      return Array.from(entries.keys());
    },

    delete(name: string): Result<void> {
      if (!entries.has(name)) return err("STAT_NOT_FOUND", `Stat "${name}" not found.`, { name });
      entries.delete(name);
      pendingDeletes.set(name, nextRevision());
      return ok(undefined);
    },

    isDirty(): boolean {
      if (pendingDeletes.size > 0) return true;
      for (const entry of entries.values()) {
        if (entry.dirty) return true;
      }
      return false;
    },

    takePending(): PendingFlush {
      const upserts: StatUpsert[] = [];
      const revisions = new Map<string, number>();
      for (const [name, entry] of entries) {
        if (!entry.dirty) continue;
        upserts.push({ name, value: entry.value });
        revisions.set(name, entry.revision);
      }
      const deletes: string[] = [];
      for (const [name, revision] of pendingDeletes) {
        deletes.push(name);
        revisions.set(name, revision);
      }
      return { upserts, deletes, revisions };
    },

    acknowledge(flush: PendingFlush): void {
      for (const upsert of flush.upserts) {
        const entry = entries.get(upsert.name);
        if (entry && entry.revision === flush.revisions.get(upsert.name)) {
          entry.dirty = false;
        }
      }
      for (const name of flush.deletes) {
        if (pendingDeletes.get(name) === flush.revisions.get(name)) {
          pendingDeletes.delete(name);
        }
      }
    }
  };
}
