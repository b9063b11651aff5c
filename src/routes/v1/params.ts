import type { Response } from "express";
import { z } from "zod";
import { ValidationError } from "../../utils/errors.js";

type WithParams = { params: Record<string, string | undefined> };

/** Reads a path parameter, including ones merged from a parent router. */
export function pathParam(req: WithParams, name: string): string {
  const value = req.params[name]?.trim();
  if (!value) {
    throw new ValidationError(`Missing path parameter ${name}`);
  }
  return value;
}

export const optionalLimit = z.coerce.number().int().optional();

export const countQuery = (fallback: number) =>
  z.object({ number: z.coerce.number().int().min(1).max(100).default(fallback) });

/** Splits "a, b,,c" into ["a", "b", "c"]. */
export function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Aborts when the client goes away before the response is written. */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
