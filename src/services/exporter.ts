// src/services/exporter.ts
import ExcelJS from "exceljs";
import type { Workbook } from "exceljs";
import papa from "papaparse";
import { toNodeBuffer } from "../lib/bufferUtils";
import { STUDENT_NAME_COLUMN, MarksTable } from "../types/marks";
import { DEFAULT_PASS_THRESHOLD, gradeRecord, summarizeGrades } from "./grader";
import { SubjectStatistics, computeSubjectStatistics } from "./statistics";

export const STATUS_COLUMNS = ["Passed Subjects", "Failed Subjects", "Overall Status"] as const;

export type ResultRow = Record<string, string | number>;

export interface CsvExportOptions {
  threshold?: number;
  includeStatus?: boolean;
}

/** Rows as the API shows them: marks, then the grading columns. */
export function buildResultRows(table: MarksTable, threshold: number, subject?: string): ResultRow[] {
  return table.records.map((record) => {
    const grades = gradeRecord(record, table.subjects, threshold);
    const summary = summarizeGrades(grades);

    const row: ResultRow = { [STUDENT_NAME_COLUMN]: record.name };
    for (const s of table.subjects) row[s] = record.marks[s];
    if (subject !== undefined) row[`Status in ${subject}`] = grades[subject] ? "Pass" : "Fail";
    row["Passed Subjects"] = summary.passedSubjects;
    row["Failed Subjects"] = summary.failedSubjects;
    row["Overall Status"] = summary.overallStatus;
    return row;
  });
}

// Header row first; an empty selection yields the header alone with no line break
const toCsv = (fields: readonly string[], data: ReadonlyArray<ReadonlyArray<string | number>>) =>
  papa.unparse([[...fields], ...data.map((row) => [...row])], { newline: "\r\n" });

export function tableToCsv(
  table: MarksTable,
  { threshold = DEFAULT_PASS_THRESHOLD, includeStatus = false }: CsvExportOptions = {}
): string {
  const fields = [STUDENT_NAME_COLUMN, ...table.subjects];
  if (!includeStatus) {
    return toCsv(
      fields,
      table.records.map((r) => [r.name, ...table.subjects.map((s) => String(r.marks[s]))])
    );
  }

  const statusFields = [...fields, ...STATUS_COLUMNS];
  const rows = buildResultRows(table, threshold);
  return toCsv(statusFields, rows.map((row) => statusFields.map((f) => String(row[f]))));
}

const formatPercentage = (value: number | null) => `${(value ?? 0).toFixed(2)}%`;

export function subjectSummaryToCsv(stats: readonly SubjectStatistics[]): string {
  return toCsv(
    ["Subject", "Passed", "Failed", "Total", "Pass Percentage"],
    stats.map((s) => [s.subject, s.passCount, s.failCount, s.total, formatPercentage(s.passPercentage)])
  );
}

function addSummarySheet(workbook: Workbook, stats: readonly SubjectStatistics[]) {
  const summary = workbook.addWorksheet("Summary");
  summary.columns = [
    { header: "Subject", key: "subject", width: 24 },
    { header: "Average", key: "average", width: 10 },
    { header: "Passed", key: "passCount", width: 10 },
    { header: "Failed", key: "failCount", width: 10 },
    { header: "Total", key: "total", width: 10 },
    { header: "Pass Percentage", key: "passPercentage", width: 16 },
  ];
  summary.getRow(1).font = { bold: true };
  stats.forEach((s) =>
    summary.addRow({
      subject: s.subject,
      average: s.average ?? "-",
      passCount: s.passCount,
      failCount: s.failCount,
      total: s.total,
      passPercentage: formatPercentage(s.passPercentage),
    })
  );
}

async function workbookToBuffer(workbook: Workbook): Promise<Buffer> {
  const buffer = await workbook.xlsx.writeBuffer();
  return toNodeBuffer(buffer);
}

export async function tableToWorkbook(table: MarksTable, threshold: number): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Marks");

  sheet.columns = [
    { header: STUDENT_NAME_COLUMN, key: STUDENT_NAME_COLUMN, width: 28 },
    ...table.subjects.map((s) => ({ header: s, key: s, width: Math.max(10, s.length + 2) })),
    ...STATUS_COLUMNS.map((c) => ({ header: c, key: c, width: 16 })),
  ];
  sheet.getRow(1).font = { bold: true };
  buildResultRows(table, threshold).forEach((row) => sheet.addRow(row));

  addSummarySheet(workbook, computeSubjectStatistics(table, threshold));
  return workbookToBuffer(workbook);
}

export async function subjectSummaryToWorkbook(stats: readonly SubjectStatistics[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  addSummarySheet(workbook, stats);
  return workbookToBuffer(workbook);
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `<base>_YYYYMMDD_HHMMSS.<ext>` in local time. */
export function exportFilename(base: string, extension: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const safeBase = base.replace(/[^a-zA-Z0-9_-]/g, "_") || "results";
  return `${safeBase}_${date}_${time}.${extension}`;
}
