import { z } from "zod";
import { RequestValidationError, type ValidationIssue } from "../errors.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const NUMERIC_STRING = /^\s*[-+]?\d+(\.\d+)?\s*$/;

/** Numbers sent as numeric strings ("2", "4022") are read as numbers; anything else is left for the schema to reject. */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === "string" && NUMERIC_STRING.test(value) ? Number(value) : value), schema);
}

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  if (year < 1) return false;
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const BugCreateRequestSchema = z.object({
  project: z.string().describe("Team project the bug is created in"),
  userStoryId: numeric(z.number().int()).describe("Parent user story the bug is linked under"),
  title: z.string(),
  assignedTo: z.string().email(),
  reproSteps: z.string(),
  effort: numeric(z.number()),
  cliente: z.string(),
  priority: numeric(z.number().int().min(1).max(4)),
  severity: z.string(),
  activity: z.string(),
  tipoDeError: z.string(),
  fechaInicioPlaneada: z
    .string()
    .refine(isCalendarDate, { message: "fechaInicioPlaneada must use the YYYY-MM-DD format" }),
  responsableBug: z.string().email(),
  aplicacion: z.string(),
  tareaAsociada: numeric(z.number().int()),
  versionAplicacion: z.string(),
  funcionalidad: z.string(),
});

export type BugCreateRequest = z.infer<typeof BugCreateRequestSchema>;

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: ["body", ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

export function parseBugCreateRequest(body: unknown): BugCreateRequest {
  const result = BugCreateRequestSchema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(toValidationIssues(result.error));
  }
  return result.data;
}
