// src/middleware/upload.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";
import path from "path";
import { badRequest, payloadTooLarge } from "./errorHandler";

const storage = multer.memoryStorage();

export const ALLOWED_EXTENSIONS = [".csv"];

export function uploadMarksFile(maxBytes: number) {
  const upload = multer({
    storage,
    limits: { fileSize: maxBytes, files: 1 },
    fileFilter: (req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (!ALLOWED_EXTENSIONS.includes(ext)) {
        return cb(badRequest("Invalid file format. Please upload a CSV file."));
      }
      cb(null, true);
    },
  }).single("file");

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (err?: unknown) => {
      if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
        return next(payloadTooLarge(maxBytes));
      }
      next(err);
    });
  };
}
