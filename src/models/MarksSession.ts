// src/models/MarksSession.ts
import mongoose, { Schema } from "mongoose";

export interface IMarksSession {
  filename: string;
  subjects: string[];
  students: Array<{
    name: string;
    marks: number[]; // aligned with `subjects`
  }>;
  passThreshold: number;
  filterType?: string;
  filterSubject?: string;
  filterCount?: number;
  expiresAt: Date;
  createdAt: Date;
}

const schema = new Schema<IMarksSession>(
  {
    filename: { type: String, required: true, trim: true },
    subjects: { type: [String], required: true },
    students: [
      {
        _id: false,
        name: { type: String, required: true },
        marks: { type: [Number], required: true },
      },
    ],
    passThreshold: { type: Number, required: true, min: 0, max: 100 },
    filterType: { type: String },
    filterSubject: { type: String },
    filterCount: { type: Number },
    expiresAt: { type: Date, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

// MongoDB drops the document once expiresAt passes
schema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export default mongoose.model<IMarksSession>("MarksSession", schema);
