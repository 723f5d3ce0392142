// src/types/marks.ts

export const SEMESTERS = ["Autumn", "Spring", "Annual"] as const;

export type SemesterName = (typeof SEMESTERS)[number];

// Semesters that show Annual sync sources as read-only projections
export const SYNC_TARGETS: readonly SemesterName[] = ["Autumn", "Spring"];

export interface AssessmentEntry {
  assessmentName: string;
  weightedMark: number; // already a percentage of the subject total
  markWeight: number; // percent out of 100
}

export interface Examination {
  examMark: number;
  examWeight: number;
}

export interface SubjectRecord {
  subjectCode: string;
  subjectName: string;
  assignments: AssessmentEntry[];
  totalMark: number;
  examination: Examination;
  isSyncSource: boolean;
}

export type SemesterSubjects = Map<string, SubjectRecord>;

export type SemesterRef =
  | { kind: "semester"; name: SemesterName }
  | { kind: "unresolved"; raw: string };

export type ExamMarkResult =
  | { status: "computed"; examMark: number; assignmentsTotal: number; examWeight: number }
  | { status: "not_applicable"; assignmentsTotal: number; examWeight: number };

export type ViewRowKind = "assessment" | "placeholder" | "synced";

export interface ViewRow {
  kind: ViewRowKind;
  subjectCode: string;
  subjectName: string;
  assessment: string;
  unweightedMark: ""; // reserved column, never populated
  weightedMark: number | null;
  markWeight: string;
  totalMark: number | null;
}
