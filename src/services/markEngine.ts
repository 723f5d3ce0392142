// src/services/markEngine.ts
import { coerceMark, MarkInput, sumBy } from "../helpers/markInput";
import { NotFoundError, ValidationError } from "../lib/errors";
import { persistYear, RecordStore } from "../stores/recordStore";
import { viewSemester } from "./semesterView";
import type { YearStore } from "./yearStore";
import type { ExamMarkResult, SemesterName, SubjectRecord, ViewRow } from "../types/marks";

export interface MarkEngineOptions {
  /** Reject changes that push assessment weights plus exam weight over 100. */
  enforceWeightCap?: boolean;
}

interface SubjectRef {
  semester: SemesterName;
  subjectCode: string;
}

export interface AddEntryInput extends SubjectRef {
  assessmentName: string;
  weightedMark?: MarkInput;
  markWeight?: MarkInput;
}

export interface DeleteEntryInput extends SubjectRef {
  assessmentName: string;
}

export interface AddSubjectInput {
  semester: SemesterName;
  subjectCode: string;
  subjectName?: string;
  syncSubject?: boolean;
}

export interface EntryDeletionOutcome {
  assessmentName: string;
  deleted: boolean;
  error?: string;
}

const WEIGHT_CAP = 100;
const EPSILON = 1e-9;

/**
 * Mutations and derived values over the subjects of one year. The YearStore
 * is passed on every call; after each mutation the whole year is saved
 * through the record store before the call resolves.
 */
export class MarkEngine {
  constructor(
    private readonly records: RecordStore,
    private readonly options: MarkEngineOptions = {}
  ) {}

  get enforcesWeightCap(): boolean {
    return this.options.enforceWeightCap === true;
  }

  async addEntry(store: YearStore, input: AddEntryInput): Promise<SubjectRecord> {
    const assessmentName = input.assessmentName.trim();
    if (!assessmentName) {
      throw new ValidationError("Assessment name cannot be empty.");
    }
    const weightedMark = coerceMark(input.weightedMark, "Weighted Mark");
    const markWeight = coerceMark(input.markWeight, "Mark Weight");

    const { record } = store.resolveOwner(input.semester, input.subjectCode);
    const existing = record.assignments.find((a) => a.assessmentName === assessmentName);

    if (this.enforcesWeightCap) {
      const otherWeights = sumBy(
        record.assignments.filter((a) => a !== existing),
        (a) => a.markWeight
      );
      this.checkWeightCap(record, otherWeights + markWeight + record.examination.examWeight);
    }

    if (existing) {
      existing.weightedMark = weightedMark;
      existing.markWeight = markWeight;
    } else {
      record.assignments.push({ assessmentName, weightedMark, markWeight });
    }

    await persistYear(this.records, store);
    return record;
  }

  async deleteEntry(store: YearStore, input: DeleteEntryInput): Promise<SubjectRecord> {
    const assessmentName = input.assessmentName.trim();
    const { record } = store.resolveOwner(input.semester, input.subjectCode);
    const index = record.assignments.findIndex((a) => a.assessmentName === assessmentName);
    if (index === -1) {
      throw new NotFoundError(`Assessment ${assessmentName} not found in ${input.subjectCode}.`);
    }

    const [removed] = record.assignments.splice(index, 1);
    // freed assessment weight goes back to the exam
    record.examination.examWeight += removed.markWeight;

    await persistYear(this.records, store);
    return record;
  }

  /**
   * Deletes each named entry on its own; a failure is reported for that
   * entry and does not undo the ones already deleted.
   */
  async deleteEntries(
    store: YearStore,
    input: SubjectRef & { assessmentNames: string[] }
  ): Promise<EntryDeletionOutcome[]> {
    const outcomes: EntryDeletionOutcome[] = [];
    for (const assessmentName of input.assessmentNames) {
      try {
        await this.deleteEntry(store, { ...input, assessmentName });
        outcomes.push({ assessmentName, deleted: true });
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        outcomes.push({ assessmentName, deleted: false, error: err.message });
      }
    }
    return outcomes;
  }

  /**
   * Back-solves the exam mark: the exam supplies whatever the assessments
   * did not, rescaled to a mark out of 100 for the exam itself. Uses the
   * stored exam weight as is; a weight of 0 or less has no exam mark.
   */
  async calculateExamMark(store: YearStore, ref: SubjectRef): Promise<ExamMarkResult> {
    const { record } = store.resolveOwner(ref.semester, ref.subjectCode);
    const assignmentsTotal = sumBy(record.assignments, (a) => a.weightedMark);
    const examWeight = record.examination.examWeight;

    if (examWeight <= 0) {
      return { status: "not_applicable", assignmentsTotal, examWeight };
    }

    const examMark = ((100 - assignmentsTotal) * 100) / examWeight;
    record.examination.examMark = examMark;

    await persistYear(this.records, store);
    return { status: "computed", examMark, assignmentsTotal, examWeight };
  }

  async setExamWeight(
    store: YearStore,
    input: SubjectRef & { examWeight: MarkInput }
  ): Promise<SubjectRecord> {
    const examWeight = coerceMark(input.examWeight, "Exam Weight");
    if (examWeight < 0 || examWeight > WEIGHT_CAP) {
      throw new ValidationError(`Exam Weight must be between 0 and ${WEIGHT_CAP}.`);
    }

    const { record } = store.resolveOwner(input.semester, input.subjectCode);
    if (this.enforcesWeightCap) {
      this.checkWeightCap(record, sumBy(record.assignments, (a) => a.markWeight) + examWeight);
    }

    record.examination.examWeight = examWeight;
    await persistYear(this.records, store);
    return record;
  }

  /** Omitting the value clears the total back to 0. */
  async setTotalMark(
    store: YearStore,
    input: SubjectRef & { totalMark?: MarkInput }
  ): Promise<SubjectRecord> {
    const totalMark = coerceMark(input.totalMark, "Total Mark");
    const { record } = store.resolveOwner(input.semester, input.subjectCode);

    record.totalMark = totalMark;
    await persistYear(this.records, store);
    return record;
  }

  /**
   * Creating a code that already exists returns the stored record and
   * leaves it as it was.
   */
  async addSubject(
    store: YearStore,
    input: AddSubjectInput
  ): Promise<{ record: SubjectRecord; created: boolean }> {
    const subjectCode = input.subjectCode.trim();
    if (!subjectCode) {
      throw new ValidationError("Subject code cannot be empty.");
    }

    const result = store.getOrCreateSubject(input.semester, subjectCode, {
      subjectName: input.subjectName?.trim() ?? "",
      isSyncSource: input.syncSubject === true && input.semester === "Annual",
    });

    if (result.created) {
      await persistYear(this.records, store);
    }
    return result;
  }

  // Only the semester's own records; synced projections are owned by Annual
  async deleteSubject(store: YearStore, ref: SubjectRef): Promise<void> {
    if (!store.deleteSubject(ref.semester, ref.subjectCode)) {
      throw new NotFoundError(`Subject ${ref.subjectCode} not found.`);
    }
    await persistYear(this.records, store);
  }

  viewSemester(store: YearStore, semester: SemesterName): ViewRow[] {
    return viewSemester(store, semester);
  }

  private checkWeightCap(record: SubjectRecord, total: number): void {
    if (total > WEIGHT_CAP + EPSILON) {
      throw new ValidationError(
        `Weights for ${record.subjectCode} would total ${total}%, above ${WEIGHT_CAP}%.`,
        { subjectCode: record.subjectCode, totalWeight: total }
      );
    }
  }
}
