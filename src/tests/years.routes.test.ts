// src/tests/years.routes.test.ts
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../app";
import { MemoryRecordStore } from "../stores/memoryStore";
import { setupService, YEAR } from "./fixtures";

const COMP101 = `/years/${YEAR}/semesters/Autumn/subjects/COMP101`;

describe("🌐 Years API", () => {
  let app: Express;
  let records: MemoryRecordStore;

  beforeEach(() => {
    const setup = setupService();
    records = setup.records;
    app = createApp(setup.service);
  });

  it("should report health with the store driver", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("OK");
    expect(res.body.store).toBe("memory");
  });

  it("should describe a year and its default semester", async () => {
    const res = await request(app).get(`/years/${YEAR}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      year: "2025",
      semesters: ["Autumn", "Spring", "Annual"],
      defaultSemester: "Autumn",
    });
  });

  it("should return 404 for a year that was never set up", async () => {
    const res = await request(app).get("/years/2030");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: "Year 2030 has not been set up" });
  });

  it("should reject a malformed year", async () => {
    const res = await request(app).get("/years/20x5");

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Year must be four digits, got "20x5"');
  });

  it("should initialise a new year with the chosen semesters", async () => {
    const created = await request(app).post("/years/2026").send({ semesters: ["Spring"] });
    expect(created.status).toBe(201);
    expect(created.body.semesters).toEqual(["Spring"]);

    const again = await request(app).post("/years/2026").send({});
    expect(again.status).toBe(200);
    expect(again.body.created).toBe(false);
  });

  it("should reject an unknown semester", async () => {
    const res = await request(app).get(`/years/${YEAR}/semesters/Winter/view`);

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Unknown semester "Winter". Expected one of: Autumn, Spring, Annual');
  });

  it("should calculate the exam mark", async () => {
    const res = await request(app).post(`${COMP101}/exam-mark`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "computed", examMark: 110, assignmentsTotal: 45, examWeight: 50 });
  });

  it("should return 404 when calculating for an unknown subject", async () => {
    const res = await request(app).post(`/years/${YEAR}/semesters/Autumn/subjects/NOPE1/exam-mark`);

    expect(res.status).toBe(404);
    expect(res.body.message).toBe("Subject NOPE1 not found.");
  });

  it("should add then delete an entry, moving weight to the exam", async () => {
    const added = await request(app)
      .put(`${COMP101}/entries`)
      .send({ assessmentName: "Quiz", weightedMark: "4", markWeight: "5" });
    expect(added.status).toBe(200);
    expect(added.body.subject.assignments).toHaveLength(3);

    const removed = await request(app).delete(`${COMP101}/entries/Assignment%201`);
    expect(removed.status).toBe(200);
    expect(removed.body.subject.examination.examWeight).toBe(70);
    expect(records.snapshot(YEAR)?.Autumn?.COMP101.Examinations?.["Exam Weight"]).toBe(70);
  });

  it("should reject non-numeric marks", async () => {
    const res = await request(app)
      .put(`${COMP101}/entries`)
      .send({ assessmentName: "Quiz", weightedMark: "abc", markWeight: 5 });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Weighted Mark must be a valid number.");
  });

  it("should reject a body of the wrong shape", async () => {
    const res = await request(app).put(`${COMP101}/entries`).send({ weightedMark: 5 });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Invalid request body");
    expect(res.body.details[0].path).toEqual(["assessmentName"]);
  });

  it("should batch delete entries and report each one", async () => {
    const res = await request(app)
      .post(`${COMP101}/entries/delete`)
      .send({ assessments: ["Assignment 2", "Essay"] });

    expect(res.status).toBe(200);
    expect(res.body.results).toEqual([
      { assessmentName: "Assignment 2", deleted: true },
      { assessmentName: "Essay", deleted: false, error: "Assessment Essay not found in COMP101." },
    ]);
  });

  it("should add a synced Annual subject that shows up in Autumn", async () => {
    const created = await request(app)
      .post(`/years/${YEAR}/semesters/Annual/subjects`)
      .send({ subjectCode: "PHYS110", subjectName: "Mechanics", syncSubject: true });
    expect(created.status).toBe(201);
    expect(created.body.subject.isSyncSource).toBe(true);

    const view = await request(app).get(`/years/${YEAR}/semesters/Autumn/view`);
    const synced = view.body.rows.filter((r: { kind: string }) => r.kind === "synced");
    expect(synced.map((r: { subjectCode: string }) => r.subjectCode)).toEqual(["MATH200", "PHYS110"]);
    expect(records.snapshot(YEAR)?.Autumn?.PHYS110).toBeUndefined();
  });

  it("should treat adding an existing subject as a no-op", async () => {
    const res = await request(app)
      .post(`/years/${YEAR}/semesters/Autumn/subjects`)
      .send({ subjectCode: "COMP101", subjectName: "Other" });

    expect(res.status).toBe(200);
    expect(res.body.created).toBe(false);
    expect(res.body.subject.subjectName).toBe("Intro to Programming");
  });

  it("should reject an empty subject code", async () => {
    const res = await request(app).post(`/years/${YEAR}/semesters/Autumn/subjects`).send({ subjectCode: "" });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Subject code cannot be empty.");
  });

  it("should set and clear the total mark", async () => {
    const set = await request(app).put(`${COMP101}/total-mark`).send({ totalMark: "81" });
    expect(set.body.subject.totalMark).toBe(81);

    const cleared = await request(app).put(`${COMP101}/total-mark`).send({});
    expect(cleared.body.subject.totalMark).toBe(0);
  });

  it("should set the exam weight", async () => {
    const res = await request(app).put(`${COMP101}/exam-weight`).send({ examWeight: 40 });

    expect(res.status).toBe(200);
    expect(res.body.subject.examination).toEqual({ examMark: 0, examWeight: 40 });
  });

  it("should delete a subject", async () => {
    const res = await request(app).delete(COMP101);

    expect(res.status).toBe(200);
    expect(res.body.message).toBe("Subject COMP101 deleted");
    expect(records.snapshot(YEAR)?.Autumn).toEqual({});
  });

  it("should remove a semester", async () => {
    const res = await request(app).delete(`/years/${YEAR}/semesters/Spring`);

    expect(res.status).toBe(200);
    expect(res.body.semesters).toEqual(["Autumn", "Annual"]);
  });

  it("should return 404 for unknown routes", async () => {
    const res = await request(app).get("/nowhere");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: "Route /nowhere not found", method: "GET" });
  });
});
