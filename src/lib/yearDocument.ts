// src/lib/yearDocument.ts
// On-disk shape of one year. Keys are kept exactly as the desktop files
// wrote them so existing data/<year>.json files load unchanged.
import { z } from "zod";
import { YearStore } from "../services/yearStore";
import { SEMESTERS, SemesterName, SemesterSubjects, SubjectRecord } from "../types/marks";

const assessmentSchema = z.object({
  "Subject Assessment": z.string(),
  "Weighted Mark": z.number(),
  "Mark Weight": z.number(),
}).strict();

const subjectSchema = z.object({
  "Subject Name": z.string().nullable().default(""),
  Assignments: z.array(assessmentSchema).default([]),
  "Total Mark": z.number().default(0),
  Examinations: z
    .object({
      "Exam Mark": z.number().default(0),
      "Exam Weight": z.number().default(0),
    })
    .strict()
    .default({}),
  "Sync Source": z.boolean().default(false),
}).strict();

// Left as the parsed object; subjects are read from its own keys so any
// code, "__proto__" included, survives a load
const semesterSchema = z.custom<Record<string, unknown>>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { message: "Expected an object of subjects" }
);

// Unknown keys fail the load rather than vanish on the next save
export const yearDocumentSchema = z
  .object({
    Autumn: semesterSchema.optional(),
    Spring: semesterSchema.optional(),
    Annual: semesterSchema.optional(),
  })
  .strict();

export type PersistedSubject = z.input<typeof subjectSchema>;
export type PersistedYear = Partial<Record<SemesterName, Record<string, PersistedSubject>>>;

export function fromYearDocument(year: string, raw: unknown): YearStore {
  const doc = yearDocumentSchema.parse(raw);
  const semesters: [SemesterName, SemesterSubjects][] = [];

  for (const name of SEMESTERS) {
    const subjects = doc[name];
    if (!subjects) continue;

    const records: SemesterSubjects = new Map();
    for (const [code, raw] of Object.entries(subjects)) {
      const subject = subjectSchema.parse(raw, { path: [name, code] });
      records.set(code, {
        subjectCode: code,
        subjectName: subject["Subject Name"] ?? "",
        assignments: subject.Assignments.map((a) => ({
          assessmentName: a["Subject Assessment"],
          weightedMark: a["Weighted Mark"],
          markWeight: a["Mark Weight"],
        })),
        totalMark: subject["Total Mark"],
        examination: {
          examMark: subject.Examinations["Exam Mark"],
          examWeight: subject.Examinations["Exam Weight"],
        },
        isSyncSource: subject["Sync Source"],
      });
    }
    semesters.push([name, records]);
  }

  return new YearStore(year, semesters);
}

export function toPersistedSubject(record: SubjectRecord): PersistedSubject {
  return {
    "Subject Name": record.subjectName,
    Assignments: record.assignments.map((a) => ({
      "Subject Assessment": a.assessmentName,
      "Weighted Mark": a.weightedMark,
      "Mark Weight": a.markWeight,
    })),
    "Total Mark": record.totalMark,
    Examinations: {
      "Exam Mark": record.examination.examMark,
      "Exam Weight": record.examination.examWeight,
    },
    "Sync Source": record.isSyncSource,
  };
}

export function toYearDocument(store: YearStore): PersistedYear {
  const doc: PersistedYear = {};
  for (const name of store.semesterNames()) {
    // fromEntries defines own keys, plain assignment would not for "__proto__"
    doc[name] = Object.fromEntries(
      [...store.subjects(name)].map(([code, record]): [string, PersistedSubject] => [
        code,
        toPersistedSubject(record),
      ])
    );
  }
  return doc;
}
