// src/services/semesterView.ts
import type { YearStore } from "./yearStore";
import { SemesterName, SubjectRecord, ViewRow } from "../types/marks";

export const NO_ASSIGNMENTS = "No Assignments";
export const SYNCED_SUBJECT = "Synced Subject";

const byCode = (a: SubjectRecord, b: SubjectRecord) => a.subjectCode.localeCompare(b.subjectCode);

function subjectRows(record: SubjectRecord): ViewRow[] {
  const base = {
    subjectCode: record.subjectCode,
    subjectName: record.subjectName,
    unweightedMark: "" as const,
    totalMark: record.totalMark,
  };

  if (record.assignments.length === 0) {
    return [{ ...base, kind: "placeholder", assessment: NO_ASSIGNMENTS, weightedMark: null, markWeight: "" }];
  }

  return record.assignments.map((entry): ViewRow => ({
    ...base,
    kind: "assessment",
    assessment: entry.assessmentName,
    weightedMark: entry.weightedMark,
    markWeight: `${entry.markWeight}%`,
  }));
}

function syncedRow(record: SubjectRecord): ViewRow {
  return {
    kind: "synced",
    subjectCode: record.subjectCode,
    subjectName: record.subjectName,
    assessment: SYNCED_SUBJECT,
    unweightedMark: "",
    weightedMark: null,
    markWeight: "",
    totalMark: null,
  };
}

/**
 * Rows for one semester: the semester's own subjects by code, then any
 * Annual sync sources it does not store itself. Numbers are left unrounded.
 */
export function viewSemester(store: YearStore, semester: SemesterName): ViewRow[] {
  const own = [...store.subjects(semester).values()].sort(byCode);
  const synced = store.syncedSubjects(semester).sort(byCode);

  return [...own.flatMap(subjectRows), ...synced.map(syncedRow)];
}
