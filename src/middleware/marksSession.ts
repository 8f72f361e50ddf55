// src/middleware/marksSession.ts
import { Request } from "express";
import { SESSION_COOKIE, readSessionId } from "../lib/jwt";
import type { MarksSessionStore } from "../services/sessionStore";
import type { MarksSessionData } from "../types/marks";
import { badRequest } from "./errorHandler";

export const NO_DATA_MESSAGE = "No data loaded. Please upload a file first.";

export async function findMarksSession(req: Request, store: MarksSessionStore): Promise<MarksSessionData | null> {
  const sessionId = readSessionId(req.cookies?.[SESSION_COOKIE]);
  return sessionId ? store.get(sessionId) : null;
}

export async function requireMarksSession(req: Request, store: MarksSessionStore): Promise<MarksSessionData> {
  const session = await findMarksSession(req, store);
  if (!session) throw badRequest(NO_DATA_MESSAGE);
  return session;
}
