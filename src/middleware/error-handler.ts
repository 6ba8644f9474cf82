import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, type ErrorDetail, invalidPayloadError } from "../engine/errors.js";

interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
  };
}

// multer reports its own limits; give them the same shape as ours.
function fromMulter(err: multer.MulterError, maxSize: number): AppError {
  if (err.code === "LIMIT_FILE_SIZE") {
    return new AppError("PAYLOAD_TOO_LARGE", 413, `File too large (max ${maxSize} bytes)`);
  }
  return invalidPayloadError(err.message);
}

export function errorHandler(maxUploadSize: number) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    let appErr = err;
    if (err instanceof multer.MulterError) {
      appErr = fromMulter(err, maxUploadSize);
    } else if (err instanceof SyntaxError) {
      // express.json() parse failure
      appErr = invalidPayloadError("Invalid JSON body");
    }

    if (appErr instanceof AppError) {
      const body: ErrorBody = {
        error: {
          code: appErr.code,
          message: appErr.message,
        },
      };
      if (appErr.details && appErr.details.length > 0) {
        body.error.details = appErr.details;
      }
      res.status(appErr.status).json(body);
      return;
    }

    console.error("ERROR:", err);
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: "Internal server error",
      },
    });
  };
}
