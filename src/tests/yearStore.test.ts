// src/tests/yearStore.test.ts
import {
  defaultSemester,
  parseYear,
  requireSemester,
  resolveSemester,
  selectableYears,
} from "../lib/academicCalendar";
import { NotFoundError, ValidationError } from "../lib/errors";
import { fromYearDocument, toYearDocument } from "../lib/yearDocument";
import { YearStore } from "../services/yearStore";
import { sampleYear, YEAR } from "./fixtures";

describe("🧮 YearStore", () => {
  it("should create a subject with defaults and its semester on demand", () => {
    const store = new YearStore(YEAR);

    const { record, created } = store.getOrCreateSubject("Spring", "BIO101");

    expect(created).toBe(true);
    expect(record).toEqual({
      subjectCode: "BIO101",
      subjectName: "",
      assignments: [],
      totalMark: 0,
      examination: { examMark: 0, examWeight: 0 },
      isSyncSource: false,
    });
    expect(store.semesterNames()).toEqual(["Spring"]);
  });

  it("should return the stored record without applying defaults", () => {
    const store = fromYearDocument(YEAR, sampleYear());

    const { record, created } = store.getOrCreateSubject("Annual", "MATH200", {
      subjectName: "Other",
      isSyncSource: false,
    });

    expect(created).toBe(false);
    expect(record.subjectName).toBe("Linear Algebra");
    expect(record.isSyncSource).toBe(true);
  });

  it("should throw NotFoundError from getSubject", () => {
    const store = fromYearDocument(YEAR, sampleYear());
    expect(() => store.getSubject("Spring", "COMP101")).toThrow(NotFoundError);
  });

  it("should resolve synced subjects to their Annual owner", () => {
    const store = fromYearDocument(YEAR, sampleYear());

    expect(store.resolveOwner("Spring", "MATH200").semester).toBe("Annual");
    expect(store.resolveOwner("Autumn", "COMP101").semester).toBe("Autumn");
    expect(store.syncedSubjects("Annual")).toEqual([]);
  });

  it("should keep semesters in Autumn, Spring, Annual order", () => {
    const store = new YearStore(YEAR);
    store.addSemester("Annual");
    store.addSemester("Autumn");

    expect(store.semesterNames()).toEqual(["Autumn", "Annual"]);
    expect(store.addSemester("Autumn")).toBe(false);
    expect(store.removeSemester("Spring")).toBe(false);
  });
});

describe("📄 Year document", () => {
  it("should write the desktop file keys back unchanged", () => {
    const doc = sampleYear();
    expect(toYearDocument(fromYearDocument(YEAR, doc))).toEqual(doc);
  });

  it("should fill in fields older files did not have", () => {
    const store = fromYearDocument(YEAR, {
      Autumn: { ENG100: { "Subject Name": null, Assignments: [] } },
    });

    expect(store.getSubject("Autumn", "ENG100")).toEqual({
      subjectCode: "ENG100",
      subjectName: "",
      assignments: [],
      totalMark: 0,
      examination: { examMark: 0, examWeight: 0 },
      isSyncSource: false,
    });
  });

  it("should load subject codes from the file's own keys", () => {
    const store = fromYearDocument(YEAR, JSON.parse('{"Autumn":{"__proto__":{},"COMP1":{}}}'));

    expect([...store.subjects("Autumn").keys()]).toEqual(["__proto__", "COMP1"]);
  });

  it("should reject keys it does not know instead of dropping them", () => {
    expect(() => fromYearDocument(YEAR, { Winter: {} })).toThrow();
    expect(() =>
      fromYearDocument(YEAR, { Autumn: { ENG100: { "Subject Name": "English", Credits: 15 } } })
    ).toThrow();
    expect(() => fromYearDocument(YEAR, { Autumn: [] })).toThrow();
  });

  it("should reject marks that are not numbers", () => {
    expect(() =>
      fromYearDocument(YEAR, {
        Autumn: {
          ENG100: {
            Assignments: [{ "Subject Assessment": "Essay", "Weighted Mark": "ten", "Mark Weight": 10 }],
          },
        },
      })
    ).toThrow();
  });
});

describe("📅 Academic calendar", () => {
  it("should resolve known semesters and flag the rest", () => {
    expect(resolveSemester(" Spring ")).toEqual({ kind: "semester", name: "Spring" });
    expect(resolveSemester("Winter")).toEqual({ kind: "unresolved", raw: "Winter" });
  });

  it("should reject unresolved semesters before they reach the engine", () => {
    expect(() => requireSemester({ kind: "unresolved", raw: "Winter" })).toThrow(
      new ValidationError('Unknown semester "Winter". Expected one of: Autumn, Spring, Annual')
    );
  });

  it("should only accept four-digit years", () => {
    expect(parseYear("2025")).toBe("2025");
    expect(() => parseYear("../etc")).toThrow(ValidationError);
  });

  it("should offer three years back through next year", () => {
    expect(selectableYears(new Date(2026, 5, 1))).toEqual(["2023", "2024", "2025", "2026", "2027"]);
  });

  it("should default to the first semester without sync sources", () => {
    const store = fromYearDocument(YEAR, sampleYear());
    expect(defaultSemester(store)).toBe("Autumn");
  });

  it("should fall back to the first semester when all hold sync sources", () => {
    const doc = sampleYear();
    const store = fromYearDocument(YEAR, { Annual: doc.Annual });

    expect(defaultSemester(store)).toBe("Annual");
    expect(defaultSemester(new YearStore(YEAR))).toBeNull();
  });
});
