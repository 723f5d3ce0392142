// src/routes/years.ts
import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { parseYear, requireSemester, resolveSemester } from "../lib/academicCalendar";
import {
  batchDeleteBody,
  entryBody,
  examWeightBody,
  initYearBody,
  parseBody,
  semesterBody,
  subjectBody,
  totalMarkBody,
} from "../lib/validate";
import type { YearService } from "../services/yearService";

// Path parameters are resolved before anything reaches the engine
function scope(req: Request) {
  return {
    year: parseYear(req.params.year),
    semester: requireSemester(resolveSemester(req.params.semester)),
  };
}

function subjectScope(req: Request) {
  return { ...scope(req), subjectCode: req.params.code };
}

export function createYearsRouter(service: YearService): Router {
  const router = Router();
  const { engine } = service;

  // LIST YEARS
  router.get(
    "/",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await service.listYears());
    })
  );

  // YEAR SUMMARY
  router.get(
    "/:year",
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await service.describeYear(parseYear(req.params.year)));
    })
  );

  // INITIALISE YEAR
  router.post(
    "/:year",
    asyncHandler(async (req: Request, res: Response) => {
      const year = parseYear(req.params.year);
      const { semesters = [] } = parseBody(initYearBody, req.body);
      const chosen = semesters.map((raw) => requireSemester(resolveSemester(raw)));

      const summary = await service.initializeYear(year, chosen);
      res.status(summary.created ? 201 : 200).json(summary);
    })
  );

  // ADD SEMESTER
  router.post(
    "/:year/semesters",
    asyncHandler(async (req: Request, res: Response) => {
      const year = parseYear(req.params.year);
      const body = parseBody(semesterBody, req.body);
      const semester = requireSemester(resolveSemester(body.semester));

      const summary = await service.addSemester(year, semester);
      res.status(summary.created ? 201 : 200).json(summary);
    })
  );

  // REMOVE SEMESTER
  router.delete(
    "/:year/semesters/:semester",
    asyncHandler(async (req: Request, res: Response) => {
      const { year, semester } = scope(req);
      res.json(await service.removeSemester(year, semester));
    })
  );

  // SEMESTER VIEW (own subjects + synced Annual subjects)
  router.get(
    "/:year/semesters/:semester/view",
    asyncHandler(async (req: Request, res: Response) => {
      const { year, semester } = scope(req);
      const rows = await service.read(year, (store) => engine.viewSemester(store, semester));
      res.json({ year, semester, rows });
    })
  );

  // ADD SUBJECT
  router.post(
    "/:year/semesters/:semester/subjects",
    asyncHandler(async (req: Request, res: Response) => {
      const { year, semester } = scope(req);
      const body = parseBody(subjectBody, req.body);

      const { record, created } = await service.mutate(year, (store) =>
        engine.addSubject(store, { semester, ...body })
      );
      res.status(created ? 201 : 200).json({ created, subject: record });
    })
  );

  // DELETE SUBJECT
  router.delete(
    "/:year/semesters/:semester/subjects/:code",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      await service.mutate(ref.year, (store) => engine.deleteSubject(store, ref));
      res.json({ message: `Subject ${ref.subjectCode} deleted` });
    })
  );

  // ADD / UPDATE ASSESSMENT ENTRY
  router.put(
    "/:year/semesters/:semester/subjects/:code/entries",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      const body = parseBody(entryBody, req.body);

      const subject = await service.mutate(ref.year, (store) =>
        engine.addEntry(store, { ...ref, ...body })
      );
      res.json({ subject });
    })
  );

  // BATCH DELETE ENTRIES
  router.post(
    "/:year/semesters/:semester/subjects/:code/entries/delete",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      const { assessments } = parseBody(batchDeleteBody, req.body);

      const results = await service.mutate(ref.year, (store) =>
        engine.deleteEntries(store, { ...ref, assessmentNames: assessments })
      );
      res.json({ results });
    })
  );

  // DELETE ASSESSMENT ENTRY
  router.delete(
    "/:year/semesters/:semester/subjects/:code/entries/:assessment",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      const subject = await service.mutate(ref.year, (store) =>
        engine.deleteEntry(store, { ...ref, assessmentName: req.params.assessment })
      );
      res.json({ subject });
    })
  );

  // CALCULATE EXAM MARK
  router.post(
    "/:year/semesters/:semester/subjects/:code/exam-mark",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      const result = await service.mutate(ref.year, (store) => engine.calculateExamMark(store, ref));
      res.json(result);
    })
  );

  // SET EXAM WEIGHT
  router.put(
    "/:year/semesters/:semester/subjects/:code/exam-weight",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      const { examWeight } = parseBody(examWeightBody, req.body);

      const subject = await service.mutate(ref.year, (store) =>
        engine.setExamWeight(store, { ...ref, examWeight })
      );
      res.json({ subject });
    })
  );

  // SET / CLEAR TOTAL MARK
  router.put(
    "/:year/semesters/:semester/subjects/:code/total-mark",
    asyncHandler(async (req: Request, res: Response) => {
      const ref = subjectScope(req);
      const { totalMark } = parseBody(totalMarkBody, req.body);

      const subject = await service.mutate(ref.year, (store) =>
        engine.setTotalMark(store, { ...ref, totalMark })
      );
      res.json({ subject });
    })
  );

  return router;
}
