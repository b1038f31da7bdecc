import { Request, Response, NextFunction } from "express";
import { ValidationError } from "../lib/errors";
import { sendValidationError } from "../routes/style-decision";

export const JSON_OBJECT_REQUIRED = "body: Request body must be a JSON object";

/**
 * Body-parser rejections (malformed JSON, or a top-level primitive under
 * strict mode) answered with the same 400 shape as any other invalid context.
 * Everything else goes on to the default handler.
 */
export function jsonBodyErrors(err: unknown, _req: Request, res: Response, next: NextFunction) {
  const isParseFailure =
    typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";

  if (!isParseFailure) {
    next(err);
    return;
  }

  if (err instanceof Error) {
    console.warn("[StyleDecision] Unparseable JSON body:", err.message);
  }
  sendValidationError(res, new ValidationError("Validation failed", [JSON_OBJECT_REQUIRED]));
}
