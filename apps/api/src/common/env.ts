import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  API_CORS_ORIGIN: z.string().min(1).default("http://localhost:3000"),
  API_PORT: z.coerce.number().int().positive().default(4000),
  APP_ENVIRONMENT: z.string().trim().min(1).default("development"),
  INVOICE_OVERDUE_AFTER_DAYS: z.coerce.number().int().min(0).default(30),
  INVOICE_NUMBER_PREFIX: z.string().trim().min(1).max(10).default("INV"),
  RECEIPT_NUMBER_PREFIX: z.string().trim().min(1).max(10).default("RCP"),
});

export type ApiEnv = z.infer<typeof envSchema>;

let cachedEnv: ApiEnv | null = null;

export function getApiEnv(): ApiEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid API environment configuration: ${issues.join("; ")}`);
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetApiEnvCache() {
  cachedEnv = null;
}
