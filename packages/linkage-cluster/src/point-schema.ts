import { z } from "zod";
import { PreconditionViolation } from "./errors";
import type { Point } from "./types";

/** Lower and upper bound of both coordinates. */
export const COORD_MIN = 0;
export const COORD_MAX = 1000;

const coordinate = z
  .number({ invalid_type_error: "must be a number" })
  .finite("must be finite")
  .min(COORD_MIN, `must be within [${COORD_MIN}, ${COORD_MAX}]`)
  .max(COORD_MAX, `must be within [${COORD_MIN}, ${COORD_MAX}]`);

/**
 * Point: integer id (exactly representable, so distinct ids stay distinct),
 * coordinates within [0, 1000].
 */
export const PointSchema = z.object({
  id: z
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .safe("must be a safe integer"),
  x: coordinate,
  y: coordinate,
});

/** First issue of a failed point parse, as "<field> <message>". */
export function describePointIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid point";
  const field = issue.path.join(".");
  return field ? `${field} ${issue.message}` : issue.message;
}

/**
 * Validate an untrusted value as a Point.
 */
export function parsePoint(input: unknown): Point {
  const result = PointSchema.safeParse(input);
  if (!result.success) {
    throw new PreconditionViolation(
      `Invalid point: ${describePointIssue(result.error)}`,
    );
  }
  return result.data;
}
