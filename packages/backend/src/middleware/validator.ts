import type { RequestHandler } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import type { ApiErrorResponse } from "@ragdesk/shared";

interface ValidationSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

export function validationErrorBody(error: ZodError): ApiErrorResponse {
  return {
    error: "Validation failed",
    code: "VALIDATION_FAILED",
    details: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }))
  };
}

export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      if (schemas.query) {
        // Checked only; handlers parse the query again for typed values.
        schemas.query.parse(req.query);
      }
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        return res.status(400).json(validationErrorBody(error));
      }

      return next(error);
    }
  };
};
