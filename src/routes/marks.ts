// src/routes/marks.ts
import { Router, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import { asyncHandler } from "../middleware/asyncHandler";
import { badRequest } from "../middleware/errorHandler";
import { findMarksSession, requireMarksSession } from "../middleware/marksSession";
import { uploadMarksFile } from "../middleware/upload";
import { clearSessionCookie, setSessionCookie } from "../lib/jwt";
import { parseMarksCsv } from "../services/marksLoader";
import { assertPassThreshold } from "../services/grader";
import { applyFilter, describeFilter, parseFilter } from "../services/filterEngine";
import {
  computeClassStatistics,
  computeStudentSummaries,
  computeSubjectStatistics,
} from "../services/statistics";
import {
  buildResultRows,
  exportFilename,
  subjectSummaryToCsv,
  subjectSummaryToWorkbook,
  tableToCsv,
  tableToWorkbook,
} from "../services/exporter";
import type { MarksSessionStore } from "../services/sessionStore";
import type { MarksSessionData, MarksTable } from "../types/marks";

export interface MarksRouterOptions {
  store: MarksSessionStore;
  passThreshold: number;
  maxUploadBytes: number;
  sessionTtlHours: number;
}

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

function readThreshold(raw: unknown, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  if (typeof raw !== "string" || !/^\d+$/.test(raw.trim())) {
    throw badRequest("Pass threshold must be a whole number between 0 and 100");
  }
  return assertPassThreshold(Number(raw.trim()));
}

const queryFlag = (value: unknown) => value === "true" || value === "1";

// Rows of the last applied filter, or every row when none was applied
function selectedTable(session: MarksSessionData): MarksTable {
  return session.selection
    ? applyFilter(session.table, session.selection, session.passThreshold)
    : session.table;
}

export function createMarksRouter({ store, passThreshold, maxUploadBytes, sessionTtlHours }: MarksRouterOptions) {
  const router = Router();

  router.post(
    "/upload",
    rateLimit({ windowMs: 60 * 60 * 1000, max: 50, standardHeaders: true, legacyHeaders: false }),
    uploadMarksFile(maxUploadBytes),
    asyncHandler(async (req: Request, res: Response) => {
      if (!req.file) {
        return res.status(400).json({ success: false, message: "No file uploaded" });
      }

      const threshold = readThreshold(req.body?.passThreshold, passThreshold);
      const table = parseMarksCsv(req.file.buffer, { maxBytes: maxUploadBytes });

      // A new upload replaces whatever this client had loaded before
      const previous = await findMarksSession(req, store);
      if (previous) await store.remove(previous.id);

      const session = await store.create({
        filename: req.file.originalname,
        table,
        passThreshold: threshold,
        selection: null,
      });
      setSessionCookie(res, session.id, sessionTtlHours);

      console.log(
        `📥 Loaded ${req.file.originalname}: ${table.records.length} students, ${table.subjects.length} subjects`
      );

      res.status(200).json({
        success: true,
        message: "File uploaded successfully",
        data: {
          filename: session.filename,
          rows: table.records.length,
          subjects: table.subjects,
          passThreshold: threshold,
          statistics: computeClassStatistics(table, threshold),
        },
      });
    })
  );

  router.get(
    "/session",
    asyncHandler(async (req: Request, res: Response) => {
      const session = await requireMarksSession(req, store);

      res.json({
        success: true,
        message: "Session loaded",
        data: {
          filename: session.filename,
          rows: session.table.records.length,
          subjects: session.table.subjects,
          passThreshold: session.passThreshold,
          filter: session.selection,
          filterDescription: session.selection ? describeFilter(session.selection) : null,
          createdAt: session.createdAt.toISOString(),
        },
      });
    })
  );

  router.post(
    "/filter",
    asyncHandler(async (req: Request, res: Response) => {
      const session = await requireMarksSession(req, store);
      const { table, passThreshold: threshold } = session;
      const filterType: unknown = req.body?.filterType;

      if (filterType === "summary") {
        const summary = computeSubjectStatistics(table, threshold);
        return res.json({
          success: true,
          message: "Summary generated successfully",
          filterDescription: "Subject-wise Pass/Fail Summary",
          data: summary,
          rows: summary.length,
        });
      }

      if (filterType === "statistics") {
        return res.json({
          success: true,
          message: "Statistics generated successfully",
          filterDescription: "Overall Class Statistics",
          statistics: computeClassStatistics(table, threshold),
        });
      }

      const filter = parseFilter(req.body, table.subjects);
      const filtered = applyFilter(table, filter, threshold);
      await store.saveSelection(session.id, filter);

      const subject = filter.type === "subject_pass" || filter.type === "subject_fail" ? filter.subject : undefined;
      const rows = buildResultRows(filtered, threshold, subject);

      res.json({
        success: true,
        message: rows.length ? "Filter applied successfully" : "No records found matching the filter criteria",
        filterDescription: describeFilter(filter),
        data: rows,
        rows: rows.length,
      });
    })
  );

  router.get(
    "/statistics",
    asyncHandler(async (req: Request, res: Response) => {
      const session = await requireMarksSession(req, store);
      const scope = req.query.scope === "filtered" ? "filtered" : "full";
      const table = scope === "filtered" ? selectedTable(session) : session.table;
      const threshold = session.passThreshold;

      res.json({
        success: true,
        message: "Statistics generated successfully",
        scope,
        filterDescription: scope === "filtered" && session.selection ? describeFilter(session.selection) : null,
        data: {
          overall: computeClassStatistics(table, threshold),
          subjects: computeSubjectStatistics(table, threshold),
          students: computeStudentSummaries(table, threshold),
        },
      });
    })
  );

  router.get(
    "/download",
    asyncHandler(async (req: Request, res: Response) => {
      const session = await requireMarksSession(req, store);
      const threshold = session.passThreshold;
      const format = req.query.format === undefined ? "csv" : req.query.format;
      if (format !== "csv" && format !== "xlsx") {
        throw badRequest("Unsupported download format. Use csv or xlsx.");
      }

      if (req.query.view === "summary") {
        const stats = computeSubjectStatistics(session.table, threshold);
        if (format === "xlsx") {
          return res
            .header("Content-Type", XLSX_MIME)
            .header("Access-Control-Expose-Headers", "Content-Disposition")
            .attachment(exportFilename("summary", "xlsx"))
            .send(await subjectSummaryToWorkbook(stats));
        }

        const csv = subjectSummaryToCsv(stats);
        return res
          .header("Content-Type", "text/csv; charset=utf-8")
          .header("Access-Control-Expose-Headers", "Content-Disposition")
          .attachment(exportFilename("summary", "csv"))
          .send(csv);
      }

      const table = selectedTable(session);
      const base = session.selection?.type ?? "results";

      if (format === "xlsx") {
        const workbook = await tableToWorkbook(table, threshold);
        return res
          .header("Content-Type", XLSX_MIME)
          .header("Access-Control-Expose-Headers", "Content-Disposition")
          .attachment(exportFilename(base, "xlsx"))
          .send(workbook);
      }

      const csv = tableToCsv(table, { threshold, includeStatus: queryFlag(req.query.includeStatus) });
      res
        .header("Content-Type", "text/csv; charset=utf-8")
        .header("Access-Control-Expose-Headers", "Content-Disposition")
        .attachment(exportFilename(base, "csv"))
        .send(csv);
    })
  );

  router.post(
    "/clear-session",
    asyncHandler(async (req: Request, res: Response) => {
      const session = await findMarksSession(req, store);
      if (session) await store.remove(session.id);
      clearSessionCookie(res);

      res.json({ success: true, message: "Session cleared. Ready for new upload." });
    })
  );

  return router;
}
