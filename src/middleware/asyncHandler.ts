// src/middleware/asyncHandler.ts
import { Request, Response, NextFunction, RequestHandler } from "express";

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

// Forwards rejected handlers to the global error handler (Express 4 does not)
export const asyncHandler =
  (fn: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
