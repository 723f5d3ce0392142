// src/services/yearService.ts
import { defaultSemester, selectableYears } from "../lib/academicCalendar";
import { NotFoundError } from "../lib/errors";
import { KeyedLock } from "../lib/yearLock";
import { persistYear, RecordStore } from "../stores/recordStore";
import { MarkEngine } from "./markEngine";
import { YearStore } from "./yearStore";
import { SEMESTERS, SemesterName } from "../types/marks";

export interface YearSummary {
  year: string;
  semesters: SemesterName[];
  defaultSemester: SemesterName | null;
}

function summarize(store: YearStore): YearSummary {
  return {
    year: store.year,
    semesters: store.semesterNames(),
    defaultSemester: defaultSemester(store),
  };
}

/**
 * Loads years from the record store and hands them to the mark engine.
 * Every mutation on a year runs under that year's lock, from load to save.
 */
export class YearService {
  private readonly lock = new KeyedLock();

  constructor(
    readonly records: RecordStore,
    readonly engine: MarkEngine
  ) {}

  async listYears(now: Date = new Date()): Promise<{ years: string[]; selectable: string[] }> {
    return { years: await this.records.listYears(), selectable: selectableYears(now) };
  }

  /** Null when nothing has been saved for the year yet. */
  async openYear(year: string): Promise<YearStore | null> {
    if (!(await this.records.exists(year))) return null;
    return this.records.load(year);
  }

  async describeYear(year: string): Promise<YearSummary> {
    const store = await this.openYear(year);
    if (!store) {
      throw new NotFoundError(`Year ${year} has not been set up`);
    }
    return summarize(store);
  }

  /**
   * Creates the chosen semesters empty and saves the year. No choice means
   * all three. An existing year is returned as it is.
   */
  async initializeYear(
    year: string,
    semesters: SemesterName[] = []
  ): Promise<YearSummary & { created: boolean }> {
    return this.lock.run(year, async () => {
      const existing = await this.openYear(year);
      if (existing) return { ...summarize(existing), created: false };

      const chosen = semesters.length > 0 ? semesters : [...SEMESTERS];
      const store = new YearStore(year);
      chosen.forEach((name) => store.addSemester(name));

      await persistYear(this.records, store);
      console.log(`Initialised ${year} with ${store.semesterNames().join(", ")}`);
      return { ...summarize(store), created: true };
    });
  }

  async addSemester(year: string, semester: SemesterName): Promise<YearSummary & { created: boolean }> {
    return this.mutate(year, async (store) => {
      const created = store.addSemester(semester);
      if (created) await persistYear(this.records, store);
      return { ...summarize(store), created };
    });
  }

  async removeSemester(year: string, semester: SemesterName): Promise<YearSummary> {
    return this.mutate(year, async (store) => {
      if (!store.removeSemester(semester)) {
        throw new NotFoundError(`Semester ${semester} not found in ${year}`);
      }
      await persistYear(this.records, store);
      return summarize(store);
    });
  }

  read<T>(year: string, fn: (store: YearStore) => T | Promise<T>): Promise<T> {
    return this.records.load(year).then(fn);
  }

  mutate<T>(year: string, fn: (store: YearStore) => Promise<T>): Promise<T> {
    return this.lock.run(year, async () => fn(await this.records.load(year)));
  }
}
