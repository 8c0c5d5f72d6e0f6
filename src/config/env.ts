import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  PORT: z.coerce.number().default(4000),
  CORS_ORIGIN: z.string().default("*"),
  ADMIN_TOKEN: z.string().optional().default(""),
  RESULTS_CHANNEL_ID: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  AUCTION_MIN_DURATION_MS: z.coerce.number().int().positive().default(10000),
  AUCTION_ANTI_SNIPING_THRESHOLD_MS: z.coerce.number().int().positive().default(15000),
  AUCTION_ANTI_SNIPING_EXTENSION_MS: z.coerce.number().int().positive().default(15000),
  AUCTION_SCAN_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  AUCTION_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(2000)
});

export type Env = z.infer<typeof EnvSchema>;

export const env = EnvSchema.parse(process.env);
