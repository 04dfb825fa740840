import path from "node:path";
import { z } from "zod";

const DEV_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://localhost:5173",
  "http://localhost:5174",
  "http://localhost:8080",
];

const envSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: "DATABASE_URL environment variable is required" })
    .min(1, "DATABASE_URL environment variable is required"),
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  ALLOWED_ORIGINS: z.string().optional(),
  WIDGET_DIST_DIR: z.string().optional(),
});

export interface AppConfig {
  databaseUrl: string;
  port: number;
  nodeEnv: "development" | "production" | "test";
  allowedOrigins: string[];
  widgetDistDir: string;
}

/**
 * Validates the process environment. DATABASE_URL has no fallback value;
 * a missing one fails startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join(", ")}`);
  }

  const { DATABASE_URL, PORT, NODE_ENV, ALLOWED_ORIGINS, WIDGET_DIST_DIR } = parsed.data;

  let allowedOrigins: string[] = [];
  if (ALLOWED_ORIGINS) {
    allowedOrigins = ALLOWED_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean);
  } else if (NODE_ENV === "development") {
    allowedOrigins = DEV_ORIGINS;
  }

  return {
    databaseUrl: DATABASE_URL,
    port: PORT,
    nodeEnv: NODE_ENV,
    allowedOrigins,
    widgetDistDir: path.resolve(WIDGET_DIST_DIR ?? path.join("web", "dist")),
  };
}
