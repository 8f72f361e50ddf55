// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

export type SessionStoreDriver = "mongo" | "memory";

function intFromEnv(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    console.warn(`⚠️ Ignoring ${name}="${raw}" (expected an integer ${min}-${max}), using ${fallback}`);
    return fallback;
  }
  return value;
}

function storeDriverFromEnv(): SessionStoreDriver {
  const raw = (process.env.SESSION_STORE || "mongo").toLowerCase();
  if (raw === "mongo" || raw === "memory") return raw;
  console.warn(`⚠️ Unknown SESSION_STORE "${raw}", using mongo`);
  return "mongo";
}

const config = Object.freeze({
  port: intFromEnv("PORT", 3000, 1, 65535),
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/marks-sheet",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:5173",
  sessionSecret: process.env.SESSION_SECRET || "please-change-me",
  sessionStore: storeDriverFromEnv(),
  sessionTtlHours: intFromEnv("SESSION_TTL_HOURS", 24, 1, 24 * 30),
  passThreshold: intFromEnv("PASS_THRESHOLD", 40, 0, 100),
  maxUploadBytes: intFromEnv("MAX_UPLOAD_MB", 16, 1, 512) * 1024 * 1024,
});

export default config;
