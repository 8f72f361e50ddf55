// src/services/filterEngine.ts
import { badRequest } from "../middleware/errorHandler";
import type { MarksFilter, MarksFilterType, MarksTable, SubjectGrades } from "../types/marks";
import { gradeRecord, summarizeGrades } from "./grader";

export const FILTER_TYPES: readonly MarksFilterType[] = [
  "all",
  "overall_pass",
  "overall_fail",
  "subject_pass",
  "subject_fail",
  "min_passed",
];

function isFilterType(value: unknown): value is MarksFilterType {
  return typeof value === "string" && FILTER_TYPES.some((t) => t === value);
}

function readSubject(value: unknown, subjects: readonly string[]): string {
  const subject = typeof value === "string" ? value.trim() : "";
  if (!subject) throw badRequest("Subject not specified");
  if (!subjects.includes(subject)) throw badRequest(`Subject '${subject}' not found in data`);
  return subject;
}

function readCount(value: unknown, subjects: readonly string[]): number {
  const count = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof count !== "number" || !Number.isInteger(count) || count < 0 || count > subjects.length) {
    throw badRequest(`Count must be a whole number between 0 and ${subjects.length}`);
  }
  return count;
}

/**
 * Validates an untrusted `{ filterType, subject?, count? }` object against
 * the subjects of the loaded table.
 */
export function parseFilter(input: unknown, subjects: readonly string[]): MarksFilter {
  if (typeof input !== "object" || input === null) throw badRequest("Invalid filter type");

  const body: Record<string, unknown> = { ...input };
  const type = body.filterType;
  if (!isFilterType(type)) throw badRequest("Invalid filter type");

  switch (type) {
    case "subject_pass":
    case "subject_fail":
      return { type, subject: readSubject(body.subject, subjects) };
    case "min_passed":
      return { type, count: readCount(body.count, subjects) };
    default:
      return { type };
  }
}

export function describeFilter(filter: MarksFilter): string {
  switch (filter.type) {
    case "all":
      return "All students";
    case "overall_pass":
      return "Students who passed all subjects";
    case "overall_fail":
      return "Students who failed at least one subject";
    case "subject_pass":
      return `Students who passed ${filter.subject}`;
    case "subject_fail":
      return `Students who failed ${filter.subject}`;
    case "min_passed":
      return `Students who passed at least ${filter.count} subject${filter.count === 1 ? "" : "s"}`;
  }
}

export function matchesFilter(filter: MarksFilter, grades: SubjectGrades): boolean {
  switch (filter.type) {
    case "all":
      return true;
    case "overall_pass":
      return summarizeGrades(grades).failedSubjects === 0;
    case "overall_fail":
      return summarizeGrades(grades).failedSubjects > 0;
    case "subject_pass":
      return grades[filter.subject] === true;
    case "subject_fail":
      return grades[filter.subject] === false;
    case "min_passed":
      return summarizeGrades(grades).passedSubjects >= filter.count;
  }
}

/** Returns a new table holding the matching records in upload order. */
export function applyFilter(table: MarksTable, filter: MarksFilter, threshold: number): MarksTable {
  return {
    subjects: [...table.subjects],
    records: table.records.filter((record) =>
      matchesFilter(filter, gradeRecord(record, table.subjects, threshold))
    ),
  };
}
