// src/lib/validate.ts
import { z } from "zod";
import { ValidationError } from "./errors";

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError("Invalid request body", result.error.issues);
  }
  return result.data;
}

// Marks may come through as typed text; coercion happens in the engine
export const markField = z.union([z.number(), z.string()]).nullable().optional();

export const initYearBody = z.object({
  semesters: z.array(z.string()).optional(),
});

export const semesterBody = z.object({
  semester: z.string(),
});

export const subjectBody = z.object({
  subjectCode: z.string(),
  subjectName: z.string().optional(),
  syncSubject: z.boolean().optional(),
});

export const entryBody = z.object({
  assessmentName: z.string(),
  weightedMark: markField,
  markWeight: markField,
});

export const batchDeleteBody = z.object({
  assessments: z.array(z.string()).min(1),
});

export const examWeightBody = z.object({
  examWeight: markField,
});

export const totalMarkBody = z.object({
  totalMark: markField,
});
