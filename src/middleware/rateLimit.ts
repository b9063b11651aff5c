import rateLimit from "express-rate-limit";
import { getEnv } from "../config/env.js";

export function createRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Too many requests, please try again later",
      retryInSeconds: Math.ceil(env.RATE_LIMIT_WINDOW_MS / 1000),
    },
    keyGenerator: (req) => {
      const forwarded = req.headers["x-forwarded-for"];
      if (typeof forwarded === "string") {
        const first = forwarded.split(",")[0]?.trim();
        if (first) {
          return first;
        }
      }
      return req.ip ?? "unknown";
    },
  });
}
