// src/lib/academicCalendar.ts
import { ValidationError } from "./errors";
import type { YearStore } from "../services/yearStore";
import { SEMESTERS, SemesterName, SemesterRef } from "../types/marks";

const YEAR_PATTERN = /^\d{4}$/;

export function isSemesterName(value: string): value is SemesterName {
  return (SEMESTERS as readonly string[]).includes(value);
}

export function resolveSemester(raw: string): SemesterRef {
  const trimmed = raw.trim();
  return isSemesterName(trimmed)
    ? { kind: "semester", name: trimmed }
    : { kind: "unresolved", raw };
}

export function requireSemester(ref: SemesterRef): SemesterName {
  if (ref.kind === "unresolved") {
    throw new ValidationError(
      `Unknown semester "${ref.raw}". Expected one of: ${SEMESTERS.join(", ")}`
    );
  }
  return ref.name;
}

export function parseYear(raw: string): string {
  const year = raw.trim();
  if (!YEAR_PATTERN.test(year)) {
    throw new ValidationError(`Year must be four digits, got "${raw}"`);
  }
  return year;
}

// Three years back through next year
export function selectableYears(now: Date = new Date()): string[] {
  const current = now.getFullYear();
  const years: string[] = [];
  for (let year = current - 3; year <= current + 1; year++) {
    years.push(String(year));
  }
  return years;
}

/**
 * First semester, alphabetically, that is empty or owns no sync sources.
 * Falls back to the first semester when every one holds sync sources.
 */
export function defaultSemester(store: YearStore): SemesterName | null {
  const names = [...store.semesterNames()].sort();
  if (names.length === 0) return null;

  for (const name of names) {
    const subjects = [...store.subjects(name).values()];
    if (subjects.every((subject) => !subject.isSyncSource)) {
      return name;
    }
  }
  return names[0];
}
