import { describe, it, expect } from "vitest";
import { RequestValidationError } from "../errors.js";
import { isCalendarDate, parseBugCreateRequest } from "./schema.js";

const validBug = {
  project: "Payments",
  userStoryId: 4021,
  title: "Checkout button does nothing",
  assignedTo: "dev@example.com",
  reproSteps: "Open the cart and press Checkout",
  effort: 3,
  cliente: "Example Corp",
  priority: 2,
  severity: "2 - High",
  activity: "Development",
  tipoDeError: "Funcional",
  fechaInicioPlaneada: "2024-03-15",
  responsableBug: "owner@example.com",
  aplicacion: "Web",
  tareaAsociada: 4022,
  versionAplicacion: "1.4.0",
  funcionalidad: "Checkout",
};

function issuesFor(body: unknown) {
  try {
    parseBugCreateRequest(body);
  } catch (err) {
    if (err instanceof RequestValidationError) return err.issues;
    throw err;
  }
  return [];
}

describe("isCalendarDate", () => {
  it("accepts real dates", () => {
    expect(isCalendarDate("2024-03-15")).toBe(true);
    expect(isCalendarDate("2024-02-29")).toBe(true);
  });

  it("rejects impossible dates", () => {
    expect(isCalendarDate("2023-02-29")).toBe(false);
    expect(isCalendarDate("2024-13-01")).toBe(false);
    expect(isCalendarDate("2024-04-31")).toBe(false);
  });

  it("rejects year zero", () => {
    expect(isCalendarDate("0000-01-01")).toBe(false);
    expect(isCalendarDate("0001-01-01")).toBe(true);
  });

  it("rejects other formats", () => {
    expect(isCalendarDate("15/03/2024")).toBe(false);
    expect(isCalendarDate("2024-3-15")).toBe(false);
    expect(isCalendarDate("2024-03-15T00:00:00")).toBe(false);
    expect(isCalendarDate("")).toBe(false);
  });
});

describe("parseBugCreateRequest", () => {
  it("returns the request when every field is valid", () => {
    expect(parseBugCreateRequest(validBug)).toEqual(validBug);
  });

  it("accepts both priority bounds", () => {
    expect(parseBugCreateRequest({ ...validBug, priority: 1 }).priority).toBe(1);
    expect(parseBugCreateRequest({ ...validBug, priority: 4 }).priority).toBe(4);
  });

  it.each([0, 5, -1, 2.5])("rejects priority %s", (priority) => {
    const issues = issuesFor({ ...validBug, priority });
    expect(issues.map((i) => i.loc)).toEqual([["body", "priority"]]);
  });

  it("reads numeric strings as numbers", () => {
    const parsed = parseBugCreateRequest({
      ...validBug,
      userStoryId: "4021",
      effort: "2.5",
      priority: "2",
      tareaAsociada: " 4022 ",
    });

    expect(parsed.userStoryId).toBe(4021);
    expect(parsed.effort).toBe(2.5);
    expect(parsed.priority).toBe(2);
    expect(parsed.tareaAsociada).toBe(4022);
  });

  it.each(["5", "abc", "", "2.5"])("rejects priority string %j", (priority) => {
    const issues = issuesFor({ ...validBug, priority });
    expect(issues.map((i) => i.loc)).toEqual([["body", "priority"]]);
  });

  it("does not read booleans as numbers", () => {
    const issues = issuesFor({ ...validBug, effort: true });
    expect(issues.map((i) => i.loc)).toEqual([["body", "effort"]]);
  });

  it("names the date field and format when the date is malformed", () => {
    expect(issuesFor({ ...validBug, fechaInicioPlaneada: "2024/03/15" })).toEqual([
      {
        loc: ["body", "fechaInicioPlaneada"],
        msg: "fechaInicioPlaneada must use the YYYY-MM-DD format",
        type: "custom",
      },
    ]);
  });

  it("rejects malformed e-mail fields", () => {
    const issues = issuesFor({ ...validBug, assignedTo: "not-an-email", responsableBug: "nobody" });
    expect(issues.map((i) => i.loc)).toEqual([
      ["body", "assignedTo"],
      ["body", "responsableBug"],
    ]);
  });

  it("reports missing fields", () => {
    const { title: _title, ...withoutTitle } = validBug;
    const issues = issuesFor(withoutTitle);
    expect(issues).toEqual([{ loc: ["body", "title"], msg: "Required", type: "invalid_type" }]);
  });

  it("rejects a body that is not an object", () => {
    expect(issuesFor(undefined)).toEqual([{ loc: ["body"], msg: "Required", type: "invalid_type" }]);
  });
});
