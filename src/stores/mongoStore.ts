// src/stores/mongoStore.ts
import YearRecord, { SemesterBlock, YearRecordShape } from "../models/YearRecord";
import { IOError, NotFoundError } from "../lib/errors";
import { YearStore } from "../services/yearStore";
import { SemesterName, SemesterSubjects, SubjectRecord } from "../types/marks";
import type { RecordStore } from "./recordStore";

export function toYearRecordShape(store: YearStore): YearRecordShape {
  const semesters: SemesterBlock[] = store.semesterNames().map((name) => ({
    name,
    subjects: [...store.subjects(name).values()].map((record) => ({
      code: record.subjectCode,
      name: record.subjectName,
      assignments: record.assignments.map((a) => ({
        name: a.assessmentName,
        weightedMark: a.weightedMark,
        markWeight: a.markWeight,
      })),
      totalMark: record.totalMark,
      examMark: record.examination.examMark,
      examWeight: record.examination.examWeight,
      syncSource: record.isSyncSource,
    })),
  }));

  return { year: store.year, semesters };
}

export function fromYearRecordShape(shape: YearRecordShape): YearStore {
  const semesters = shape.semesters.map((block): [SemesterName, SemesterSubjects] => [
    block.name,
    new Map(
      block.subjects.map((s): [string, SubjectRecord] => [
        s.code,
        {
          subjectCode: s.code,
          subjectName: s.name ?? "",
          assignments: s.assignments.map((a) => ({
            assessmentName: a.name,
            weightedMark: a.weightedMark,
            markWeight: a.markWeight,
          })),
          totalMark: s.totalMark,
          examination: { examMark: s.examMark, examWeight: s.examWeight },
          isSyncSource: s.syncSource,
        },
      ])
    ),
  ]);

  return new YearStore(shape.year, semesters);
}

// One YearRecord document per academic year
export class MongoRecordStore implements RecordStore {
  readonly driver = "mongo" as const;

  async listYears(): Promise<string[]> {
    const years = await YearRecord.distinct("year");
    return years.map(String).sort();
  }

  async exists(year: string): Promise<boolean> {
    return (await YearRecord.countDocuments({ year })) > 0;
  }

  async load(year: string): Promise<YearStore> {
    let doc: YearRecordShape | null;
    try {
      doc = await YearRecord.findOne({ year })
        .select("year semesters")
        .lean<YearRecordShape>()
        .exec();
    } catch (err) {
      throw new IOError(year, "load", err);
    }

    if (!doc) {
      throw new NotFoundError(`No data saved for ${year}`);
    }
    return fromYearRecordShape(doc);
  }

  async save(store: YearStore): Promise<void> {
    const shape = toYearRecordShape(store);
    try {
      await YearRecord.findOneAndUpdate(
        { year: shape.year },
        { $set: { semesters: shape.semesters } },
        { upsert: true, runValidators: true, setDefaultsOnInsert: true }
      );
    } catch (err) {
      throw new IOError(store.year, "save", err);
    }
  }
}
