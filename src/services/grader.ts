// src/services/grader.ts
import { badRequest } from "../middleware/errorHandler";
import type { GradeSummary, StudentRecord, SubjectGrades } from "../types/marks";

export const DEFAULT_PASS_THRESHOLD = 40;
export const MIN_MARK = 0;
export const MAX_MARK = 100;

export function isValidMark(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_MARK && value <= MAX_MARK;
}

export function assertPassThreshold(threshold: number): number {
  if (!isValidMark(threshold)) {
    throw badRequest(`Pass threshold must be a whole number between ${MIN_MARK} and ${MAX_MARK}`);
  }
  return threshold;
}

/** A mark equal to the threshold passes. */
export function isPassingMark(mark: number, threshold: number = DEFAULT_PASS_THRESHOLD): boolean {
  assertPassThreshold(threshold);
  if (!isValidMark(mark)) {
    throw badRequest(`Invalid mark ${mark}. Marks should be whole numbers between ${MIN_MARK}-${MAX_MARK}`);
  }
  return mark >= threshold;
}

export function gradeRecord(
  record: StudentRecord,
  subjects: readonly string[],
  threshold: number = DEFAULT_PASS_THRESHOLD
): SubjectGrades {
  const grades: SubjectGrades = {};
  for (const subject of subjects) {
    const mark = record.marks[subject];
    if (mark === undefined) {
      throw badRequest(`Missing mark for ${subject} (${record.name})`);
    }
    grades[subject] = isPassingMark(mark, threshold);
  }
  return grades;
}

export function summarizeGrades(grades: SubjectGrades): GradeSummary {
  const results = Object.values(grades);
  const passedSubjects = results.filter(Boolean).length;
  const failedSubjects = results.length - passedSubjects;

  return {
    passedSubjects,
    failedSubjects,
    overallStatus: failedSubjects === 0 ? "Pass" : "Fail",
  };
}
