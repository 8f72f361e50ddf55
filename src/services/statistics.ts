// src/services/statistics.ts
import type { MarksTable, OverallStatus } from "../types/marks";
import { gradeRecord, isPassingMark, summarizeGrades } from "./grader";

export interface SubjectStatistics {
  subject: string;
  average: number | null;
  passCount: number;
  failCount: number;
  total: number;
  passPercentage: number | null;
  highest: number | null;
  lowest: number | null;
}

export interface StudentSummary {
  name: string;
  average: number | null;
  passedSubjects: number;
  failedSubjects: number;
  overallStatus: OverallStatus;
}

export interface ClassStatistics {
  totalStudents: number;
  passedStudents: number;
  failedStudents: number;
  passPercentage: number | null;
  averageMark: number | null;
  highestMark: number | null;
  lowestMark: number | null;
}

const round2 = (value: number) => Number(value.toFixed(2));

// null instead of NaN for empty input
function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return round2(values.reduce((a, b) => a + b, 0) / values.length);
}

function percentage(part: number, total: number): number | null {
  return total > 0 ? round2((part / total) * 100) : null;
}

const maxOf = (values: readonly number[]) =>
  values.length ? values.reduce((a, b) => (b > a ? b : a)) : null;
const minOf = (values: readonly number[]) =>
  values.length ? values.reduce((a, b) => (b < a ? b : a)) : null;

export function computeSubjectStatistics(table: MarksTable, threshold: number): SubjectStatistics[] {
  return table.subjects.map((subject) => {
    const marks = table.records.map((r) => r.marks[subject]);
    const passCount = marks.filter((m) => isPassingMark(m, threshold)).length;

    return {
      subject,
      average: mean(marks),
      passCount,
      failCount: marks.length - passCount,
      total: marks.length,
      passPercentage: percentage(passCount, marks.length),
      highest: maxOf(marks),
      lowest: minOf(marks),
    };
  });
}

export function computeStudentSummaries(table: MarksTable, threshold: number): StudentSummary[] {
  return table.records.map((record) => {
    const summary = summarizeGrades(gradeRecord(record, table.subjects, threshold));
    return {
      name: record.name,
      average: mean(table.subjects.map((s) => record.marks[s])),
      ...summary,
    };
  });
}

export function computeClassStatistics(table: MarksTable, threshold: number): ClassStatistics {
  const summaries = computeStudentSummaries(table, threshold);
  const passedStudents = summaries.filter((s) => s.overallStatus === "Pass").length;
  const allMarks = table.records.flatMap((r) => table.subjects.map((s) => r.marks[s]));

  return {
    totalStudents: summaries.length,
    passedStudents,
    failedStudents: summaries.length - passedStudents,
    passPercentage: percentage(passedStudents, summaries.length),
    averageMark: mean(allMarks),
    highestMark: maxOf(allMarks),
    lowestMark: minOf(allMarks),
  };
}
