import { z } from "zod";
export const envSchema = z.object({
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().optional().default("gemini-2.0-flash-lite"),
  SERPAPI_API_KEY: z.string().min(1).optional(), // Without it every search fails and callers get cached/default contacts
  SOS_CACHE_DB_PATH: z.string().min(1).optional().default("data/sos-cache.db"),
  SOS_CACHE_TTL_DAYS: z.coerce.number().positive().optional().default(30),
  SOS_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(15000),
  SOS_EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(20000),
  SOS_POLICY_PATH: z.string().min(1).optional(),
  SOS_DEFAULT_COUNTRY: z.string().min(1).optional().default("India"),
  ADMIN_BASIC_USER: z.string().min(1).optional(),
  ADMIN_BASIC_PASS: z.string().min(1).optional(),
  PORT: z.coerce.number().optional(),
  RATE_LIMIT_TTL_SEC: z.coerce.number().optional(),
  RATE_LIMIT_REQ_PER_TTL: z.coerce.number().optional(),
  NODE_ENV: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;
