import type { z } from "zod";
import { ValidationError } from "../errors";

function invalidBody(err: z.ZodError) {
  return new ValidationError("INVALID_BODY", "Request body is invalid.", {
    details: err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
  });
}

/** Parse a JSON body or throw `INVALID_BODY`. */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw invalidBody(parsed.error);
  return parsed.data;
}
