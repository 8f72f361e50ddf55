// src/types/marks.ts

export const STUDENT_NAME_COLUMN = "Student Name";

export interface StudentRecord {
  name: string;
  marks: Record<string, number>; // subject -> 0..100
}

export interface MarksTable {
  subjects: string[]; // header order
  records: StudentRecord[]; // upload order
}

export type SubjectGrades = Record<string, boolean>;

export type OverallStatus = "Pass" | "Fail";

export interface GradeSummary {
  passedSubjects: number;
  failedSubjects: number;
  overallStatus: OverallStatus;
}

export type MarksFilter =
  | { type: "all" }
  | { type: "overall_pass" }
  | { type: "overall_fail" }
  | { type: "subject_pass"; subject: string }
  | { type: "subject_fail"; subject: string }
  | { type: "min_passed"; count: number };

export type MarksFilterType = MarksFilter["type"];

export interface MarksSessionData {
  id: string;
  filename: string;
  table: MarksTable;
  passThreshold: number;
  selection: MarksFilter | null;
  createdAt: Date;
}

export type NewMarksSession = Omit<MarksSessionData, "id" | "createdAt">;
