// src/tests/fixtures.ts
import type { PersistedSubject, PersistedYear } from "../lib/yearDocument";
import { MarkEngine, MarkEngineOptions } from "../services/markEngine";
import { YearService } from "../services/yearService";
import { MemoryRecordStore } from "../stores/memoryStore";

export const YEAR = "2025";

type SampleYear = Record<"Autumn" | "Spring" | "Annual", Record<string, PersistedSubject>>;

export function sampleYear(): SampleYear {
  return {
    Autumn: {
      COMP101: {
        "Subject Name": "Intro to Programming",
        Assignments: [
          { "Subject Assessment": "Assignment 1", "Weighted Mark": 20, "Mark Weight": 20 },
          { "Subject Assessment": "Assignment 2", "Weighted Mark": 25, "Mark Weight": 30 },
        ],
        "Total Mark": 0,
        Examinations: { "Exam Mark": 0, "Exam Weight": 50 },
        "Sync Source": false,
      },
    },
    Spring: {},
    Annual: {
      MATH200: {
        "Subject Name": "Linear Algebra",
        Assignments: [],
        "Total Mark": 0,
        Examinations: { "Exam Mark": 0, "Exam Weight": 0 },
        "Sync Source": true,
      },
      HIST150: {
        "Subject Name": "Modern History",
        Assignments: [],
        "Total Mark": 0,
        Examinations: { "Exam Mark": 0, "Exam Weight": 0 },
        "Sync Source": false,
      },
    },
  };
}

export async function setupEngine(doc: PersistedYear = sampleYear(), options: MarkEngineOptions = {}) {
  const records = new MemoryRecordStore({ [YEAR]: doc });
  const engine = new MarkEngine(records, options);
  const store = await records.load(YEAR);
  return { records, engine, store };
}

export function setupService(doc: PersistedYear = sampleYear(), options: MarkEngineOptions = {}) {
  const records = new MemoryRecordStore({ [YEAR]: doc });
  const service = new YearService(records, new MarkEngine(records, options));
  return { records, service };
}
