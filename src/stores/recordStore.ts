// src/stores/recordStore.ts
import { IOError } from "../lib/errors";
import type { YearStore } from "../services/yearStore";

export const STORE_DRIVERS = ["json", "mongo", "memory"] as const;
export type StoreDriver = (typeof STORE_DRIVERS)[number];

export interface RecordStore {
  readonly driver: StoreDriver;
  listYears(): Promise<string[]>;
  exists(year: string): Promise<boolean>;
  /** Rejects with NotFoundError when the year has never been saved. */
  load(year: string): Promise<YearStore>;
  /** Rejects with IOError when the write fails. */
  save(store: YearStore): Promise<void>;
}

export async function persistYear(records: RecordStore, store: YearStore): Promise<void> {
  try {
    await records.save(store);
  } catch (err) {
    if (err instanceof IOError) throw err;
    throw new IOError(store.year, "save", err);
  }
}
