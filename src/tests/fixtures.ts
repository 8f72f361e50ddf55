// src/tests/fixtures.ts
import type { MarksTable } from "../types/marks";

export const CLASS_CSV = [
  "Student Name,Math,English,Science",
  "John Smith,85,78,40",
  "Jane Doe,92,35,67",
  "Ali Khan,39,55,20",
].join("\r\n");

export const classTable = (): MarksTable => ({
  subjects: ["Math", "English", "Science"],
  records: [
    { name: "John Smith", marks: { Math: 85, English: 78, Science: 40 } },
    { name: "Jane Doe", marks: { Math: 92, English: 35, Science: 67 } },
    { name: "Ali Khan", marks: { Math: 39, English: 55, Science: 20 } },
  ],
});

export const emptyTable = (): MarksTable => ({ subjects: ["Math", "English"], records: [] });

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
