import cors from "cors";
import { getEnv } from "../config/env.js";

export function createCors() {
  const env = getEnv();
  const origins = env.CORS_ORIGIN.split(",").map((item) => item.trim()).filter(Boolean);

  return cors({
    origin: origins.length > 1 ? origins : env.CORS_ORIGIN,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    exposedHeaders: ["RateLimit", "RateLimit-Policy", "Retry-After"],
    credentials: env.CORS_ORIGIN !== "*",
    maxAge: 86400,
  });
}
