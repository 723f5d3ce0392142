// src/models/YearRecord.ts
import mongoose, { Schema, Document } from "mongoose";
import { SEMESTERS, SemesterName } from "../types/marks";

// Subject codes are stored as fields, not as document keys
export interface SubjectBlock {
  code: string;
  name: string;
  assignments: Array<{
    name: string;
    weightedMark: number;
    markWeight: number;
  }>;
  totalMark: number;
  examMark: number;
  examWeight: number;
  syncSource: boolean;
}

export interface SemesterBlock {
  name: SemesterName;
  subjects: SubjectBlock[];
}

export interface YearRecordShape {
  year: string; // e.g. "2025"
  semesters: SemesterBlock[];
}

export interface IYearRecord extends Document, YearRecordShape {}

const subjectSchema = new Schema<SubjectBlock>(
  {
    code: { type: String, required: true, trim: true },
    name: { type: String, default: "" },
    assignments: [
      {
        name: { type: String, required: true },
        weightedMark: { type: Number, default: 0 },
        markWeight: { type: Number, default: 0 },
      },
    ],
    totalMark: { type: Number, default: 0 },
    examMark: { type: Number, default: 0 },
    examWeight: { type: Number, default: 0 },
    syncSource: { type: Boolean, default: false },
  },
  { _id: false }
);

const semesterSchema = new Schema<SemesterBlock>(
  {
    name: { type: String, enum: [...SEMESTERS], required: true },
    subjects: [subjectSchema],
  },
  { _id: false }
);

const schema = new Schema<IYearRecord>(
  {
    year: { type: String, required: true, match: /^\d{4}$/ },
    semesters: [semesterSchema],
  },
  { timestamps: true }
);

schema.index({ year: 1 }, { unique: true });

export default mongoose.model<IYearRecord>("YearRecord", schema);
