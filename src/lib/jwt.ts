// src/lib/jwt.ts
import jwt from "jsonwebtoken";
import { Response } from "express";
import config from "../config/config";

export const SESSION_COOKIE = "marks_session";

// Signed HttpOnly cookie carrying the id of the uploaded marks session
export const setSessionCookie = (res: Response, sessionId: string, ttlHours = config.sessionTtlHours) => {
  const token = jwt.sign({ sid: sessionId }, config.sessionSecret, { expiresIn: ttlHours * 60 * 60 });

  res.cookie(SESSION_COOKIE, token, {
    httpOnly: true,
    sameSite: "strict",
    secure: process.env.NODE_ENV === "production",
    maxAge: ttlHours * 60 * 60 * 1000,
  });
};

export const clearSessionCookie = (res: Response) => {
  res.clearCookie(SESSION_COOKIE, { httpOnly: true, sameSite: "strict" });
};

/** Returns the session id, or null when the token is missing, forged or expired. */
export const readSessionId = (token: unknown): string | null => {
  if (typeof token !== "string" || !token) return null;
  try {
    const payload = jwt.verify(token, config.sessionSecret);
    if (typeof payload === "object" && typeof payload.sid === "string") return payload.sid;
    return null;
  } catch {
    return null;
  }
};
