// src/stores/memoryStore.ts
import { NotFoundError } from "../lib/errors";
import { fromYearDocument, PersistedYear, toYearDocument } from "../lib/yearDocument";
import type { YearStore } from "../services/yearStore";
import type { RecordStore } from "./recordStore";

// Keeps serialized copies so callers never share state with what was saved
export class MemoryRecordStore implements RecordStore {
  readonly driver = "memory" as const;
  private readonly years = new Map<string, string>();

  constructor(seed: Record<string, PersistedYear> = {}) {
    for (const [year, doc] of Object.entries(seed)) {
      this.years.set(year, JSON.stringify(doc));
    }
  }

  async listYears(): Promise<string[]> {
    return [...this.years.keys()].sort();
  }

  async exists(year: string): Promise<boolean> {
    return this.years.has(year);
  }

  async load(year: string): Promise<YearStore> {
    const raw = this.years.get(year);
    if (raw === undefined) {
      throw new NotFoundError(`No data saved for ${year}`);
    }
    return fromYearDocument(year, JSON.parse(raw));
  }

  async save(store: YearStore): Promise<void> {
    this.years.set(store.year, JSON.stringify(toYearDocument(store)));
  }

  /** The document as it would be written to disk. */
  snapshot(year: string): PersistedYear | undefined {
    const raw = this.years.get(year);
    return raw === undefined ? undefined : JSON.parse(raw);
  }
}
