// src/services/marksLoader.ts
import papa from "papaparse";
import { badRequest, payloadTooLarge } from "../middleware/errorHandler";
import { STUDENT_NAME_COLUMN, MarksTable, StudentRecord } from "../types/marks";
import { MAX_MARK, MIN_MARK, isValidMark } from "./grader";

export const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;
const MAX_REPORTED_ERRORS = 50;
const NUMERIC = /^-?\d+(\.\d+)?$/;

interface NumberedRow {
  line: number;
  cells: string[];
}

export interface LoadOptions {
  maxBytes?: number;
}

function parseMarkCell(cell: string, subject: string): number | string {
  if (cell === "") return `missing mark for ${subject}`;
  if (!NUMERIC.test(cell)) return `non-numeric mark "${cell}" for ${subject}`;

  const value = Number(cell);
  if (!isValidMark(value)) {
    return `mark ${cell} for ${subject} must be a whole number between ${MIN_MARK}-${MAX_MARK}`;
  }
  return value;
}

function readHeader(headers: string[]): string[] {

  if (headers.length < 2) {
    throw badRequest("CSV must have at least Student Name and one subject column");
  }
  if (!headers[0]) throw badRequest("First column should be Student Name");

  const subjects = headers.slice(1);
  if (subjects.every((h) => NUMERIC.test(h))) {
    throw badRequest("Missing header row");
  }

  const blank = subjects.findIndex((h) => h === "");
  if (blank !== -1) throw badRequest(`Column ${blank + 2} has no subject name`);

  const seen = new Set<string>();
  for (const subject of subjects) {
    if (subject === STUDENT_NAME_COLUMN || seen.has(subject)) {
      throw badRequest(`Duplicate column: ${subject}`);
    }
    seen.add(subject);
  }

  return subjects;
}

/**
 * Reads an uploaded marks sheet. The first column always becomes
 * "Student Name"; every other column is a subject.
 */
export function parseMarksCsv(buffer: Buffer, { maxBytes = DEFAULT_MAX_UPLOAD_BYTES }: LoadOptions = {}): MarksTable {
  if (buffer.length > maxBytes) throw payloadTooLarge(maxBytes);

  const text = buffer.toString("utf-8").replace(/^\uFEFF/, "");
  if (!text.trim()) throw badRequest("CSV file is empty");

  const parsed = papa.parse<string[]>(text, { delimiter: ",", skipEmptyLines: false });
  if (parsed.errors.length) {
    const first = parsed.errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw badRequest(`CSV parse error: ${first.message}${where}`);
  }

  // Keep file line numbers for error messages; quoted cells may span lines
  const lines: NumberedRow[] = [];
  let line = 1;
  for (const row of parsed.data) {
    const cells = row.map((c) => c.trim());
    if (cells.some((c) => c !== "")) lines.push({ line, cells });
    line += 1 + row.reduce((n, c) => n + (c.match(/\r\n|\r|\n/g)?.length ?? 0), 0);
  }
  if (lines.length === 0) throw badRequest("CSV file is empty");

  const [header, ...body] = lines;
  const subjects = readHeader(header.cells);
  if (body.length === 0) throw badRequest("CSV file has no student rows");

  const records: StudentRecord[] = [];
  const errors: string[] = [];
  const columns = subjects.length + 1;

  body.forEach(({ line: rowNum, cells }) => {
    if (cells.length !== columns) {
      errors.push(`Row ${rowNum}: expected ${columns} columns, found ${cells.length}`);
      return;
    }

    const [name, ...markCells] = cells;
    const rowErrors: string[] = [];
    if (!name) rowErrors.push("missing student name");

    const marks: Record<string, number> = {};
    subjects.forEach((subject, i) => {
      const mark = parseMarkCell(markCells[i], subject);
      if (typeof mark === "string") rowErrors.push(mark);
      else marks[subject] = mark;
    });

    if (rowErrors.length) {
      errors.push(`Row ${rowNum}: ${rowErrors.join("; ")}`);
      return;
    }
    records.push({ name, marks });
  });

  if (errors.length) {
    throw badRequest("Invalid marks file", {
      totalErrors: errors.length,
      errors: errors.slice(0, MAX_REPORTED_ERRORS),
    });
  }

  return { subjects, records };
}
