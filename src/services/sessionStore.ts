// src/services/sessionStore.ts
import { randomUUID } from "crypto";
import mongoose from "mongoose";
import type { SessionStoreDriver } from "../config/config";
import MarksSession from "../models/MarksSession";
import type { MarksFilter, MarksSessionData, MarksTable, NewMarksSession } from "../types/marks";
import { parseFilter } from "./filterEngine";

export interface MarksSessionStore {
  create(data: NewMarksSession): Promise<MarksSessionData>;
  get(id: string): Promise<MarksSessionData | null>;
  saveSelection(id: string, selection: MarksFilter | null): Promise<void>;
  remove(id: string): Promise<void>;
}

const HOUR_MS = 60 * 60 * 1000;

type FilterField = "filterType" | "filterSubject" | "filterCount";

function cloneTable(table: MarksTable): MarksTable {
  return {
    subjects: [...table.subjects],
    records: table.records.map((r) => ({ name: r.name, marks: { ...r.marks } })),
  };
}

/** Holds sessions in this process; used for local runs and tests. */
export class MemoryMarksSessionStore implements MarksSessionStore {
  private readonly sessions = new Map<string, { data: MarksSessionData; expiresAt: number }>();

  constructor(private readonly ttlHours = 24) {}

  async create(data: NewMarksSession): Promise<MarksSessionData> {
    this.evictExpired();
    const session: MarksSessionData = {
      ...data,
      table: cloneTable(data.table),
      id: randomUUID(),
      createdAt: new Date(),
    };
    this.sessions.set(session.id, { data: session, expiresAt: Date.now() + this.ttlHours * HOUR_MS });
    return session;
  }

  async get(id: string): Promise<MarksSessionData | null> {
    const entry = this.sessions.get(id);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.sessions.delete(id);
      return null;
    }
    return { ...entry.data, table: cloneTable(entry.data.table) };
  }

  async saveSelection(id: string, selection: MarksFilter | null): Promise<void> {
    const entry = this.sessions.get(id);
    if (entry) entry.data = { ...entry.data, selection };
  }

  async remove(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictExpired() {
    const now = Date.now();
    for (const [id, entry] of this.sessions) {
      if (entry.expiresAt <= now) this.sessions.delete(id);
    }
  }
}

export class MongoMarksSessionStore implements MarksSessionStore {
  constructor(private readonly ttlHours = 24) {}

  async create(data: NewMarksSession): Promise<MarksSessionData> {
    const { subjects, records } = data.table;
    const doc = await MarksSession.create({
      filename: data.filename,
      subjects,
      students: records.map((r) => ({ name: r.name, marks: subjects.map((s) => r.marks[s]) })),
      passThreshold: data.passThreshold,
      expiresAt: new Date(Date.now() + this.ttlHours * HOUR_MS),
    });
    return {
      ...data,
      table: cloneTable(data.table),
      id: doc._id.toString(),
      createdAt: doc.createdAt,
    };
  }

  async get(id: string): Promise<MarksSessionData | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;

    const doc = await MarksSession.findById(id).lean();
    if (!doc || doc.expiresAt.getTime() <= Date.now()) return null;

    const subjects = [...doc.subjects];
    const table: MarksTable = {
      subjects,
      records: doc.students.map((s) => ({
        name: s.name,
        marks: Object.fromEntries(subjects.map((subject, i) => [subject, s.marks[i]])),
      })),
    };

    // A stored filter that no longer validates is dropped rather than trusted
    let selection: MarksFilter | null = null;
    if (doc.filterType) {
      try {
        selection = parseFilter(
          { filterType: doc.filterType, subject: doc.filterSubject, count: doc.filterCount },
          subjects
        );
      } catch (err) {
        console.warn(`Discarding stored filter for session ${id}:`, err);
      }
    }

    return {
      id,
      filename: doc.filename,
      table,
      passThreshold: doc.passThreshold,
      selection,
      createdAt: doc.createdAt,
    };
  }

  async saveSelection(id: string, selection: MarksFilter | null): Promise<void> {
    if (!mongoose.Types.ObjectId.isValid(id)) return;

    const $set: Partial<Record<FilterField, string | number>> = {};
    const $unset: Partial<Record<FilterField, 1>> = {};

    if (!selection) {
      Object.assign($unset, { filterType: 1, filterSubject: 1, filterCount: 1 });
    } else {
      $set.filterType = selection.type;
      if ("subject" in selection) $set.filterSubject = selection.subject;
      else $unset.filterSubject = 1;
      if ("count" in selection) $set.filterCount = selection.count;
      else $unset.filterCount = 1;
    }

    await MarksSession.findByIdAndUpdate(id, { $set, $unset });
  }

  async remove(id: string): Promise<void> {
    if (!mongoose.Types.ObjectId.isValid(id)) return;
    await MarksSession.findByIdAndDelete(id);
  }
}

export function createSessionStore(driver: SessionStoreDriver, ttlHours: number): MarksSessionStore {
  return driver === "memory" ? new MemoryMarksSessionStore(ttlHours) : new MongoMarksSessionStore(ttlHours);
}
