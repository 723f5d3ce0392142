// src/services/yearStore.ts
import { NotFoundError } from "../lib/errors";
import {
  SEMESTERS,
  SYNC_TARGETS,
  SemesterName,
  SemesterSubjects,
  SubjectRecord,
} from "../types/marks";

export interface SubjectDefaults {
  subjectName?: string;
  isSyncSource?: boolean;
}

export function newSubjectRecord(subjectCode: string, defaults: SubjectDefaults = {}): SubjectRecord {
  return {
    subjectCode,
    subjectName: defaults.subjectName ?? "",
    assignments: [],
    totalMark: 0,
    examination: { examMark: 0, examWeight: 0 },
    isSyncSource: defaults.isSyncSource ?? false,
  };
}

export interface OwnedSubject {
  semester: SemesterName;
  record: SubjectRecord;
}

/**
 * One academic year of subject records, keyed by semester and subject code.
 * Instances are owned by whoever loaded them and passed explicitly to the
 * mark engine; nothing here touches persistence.
 */
export class YearStore {
  private readonly semesters = new Map<SemesterName, SemesterSubjects>();

  constructor(readonly year: string, semesters: Iterable<[SemesterName, SemesterSubjects]> = []) {
    for (const [name, subjects] of semesters) {
      this.semesters.set(name, subjects);
    }
  }

  semesterNames(): SemesterName[] {
    return SEMESTERS.filter((name) => this.semesters.has(name));
  }

  hasSemester(name: SemesterName): boolean {
    return this.semesters.has(name);
  }

  /** Returns false when the semester already existed. */
  addSemester(name: SemesterName): boolean {
    if (this.semesters.has(name)) return false;
    this.semesters.set(name, new Map());
    return true;
  }

  removeSemester(name: SemesterName): boolean {
    return this.semesters.delete(name);
  }

  subjects(name: SemesterName): SemesterSubjects {
    const subjects = this.semesters.get(name);
    if (!subjects) {
      throw new NotFoundError(`Semester ${name} not found in ${this.year}`);
    }
    return subjects;
  }

  findSubject(semester: SemesterName, subjectCode: string): SubjectRecord | undefined {
    return this.semesters.get(semester)?.get(subjectCode);
  }

  getSubject(semester: SemesterName, subjectCode: string): SubjectRecord {
    const record = this.findSubject(semester, subjectCode);
    if (!record) {
      throw new NotFoundError(`Subject ${subjectCode} not found.`);
    }
    return record;
  }

  /**
   * Creates the semester and the subject with default fields when missing.
   * An existing record is returned untouched; the defaults are ignored.
   */
  getOrCreateSubject(
    semester: SemesterName,
    subjectCode: string,
    defaults: SubjectDefaults = {}
  ): { record: SubjectRecord; created: boolean } {
    this.addSemester(semester);
    const subjects = this.subjects(semester);

    const existing = subjects.get(subjectCode);
    if (existing) return { record: existing, created: false };

    const record = newSubjectRecord(subjectCode, defaults);
    subjects.set(subjectCode, record);
    return { record, created: true };
  }

  deleteSubject(semester: SemesterName, subjectCode: string): boolean {
    return this.semesters.get(semester)?.delete(subjectCode) ?? false;
  }

  // Annual sync sources not shadowed by a record stored in `semester`
  syncedSubjects(semester: SemesterName): SubjectRecord[] {
    if (!SYNC_TARGETS.includes(semester)) return [];
    const annual = this.semesters.get("Annual");
    if (!annual) return [];

    const local = this.semesters.get(semester);
    return [...annual.values()].filter(
      (record) => record.isSyncSource && !local?.has(record.subjectCode)
    );
  }

  /**
   * Finds the record a mutation scoped to `semester` should act on: the
   * semester's own record, or the Annual record it projects as a synced row.
   */
  resolveOwner(semester: SemesterName, subjectCode: string): OwnedSubject {
    const local = this.findSubject(semester, subjectCode);
    if (local) return { semester, record: local };

    const synced = this.syncedSubjects(semester).find((r) => r.subjectCode === subjectCode);
    if (synced) return { semester: "Annual", record: synced };

    throw new NotFoundError(`Subject ${subjectCode} not found.`);
  }
}
