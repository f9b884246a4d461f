import { z } from "zod";

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: z
    .string()
    .optional()
    .transform((v) => (v == null ? false : v === "true")),
  DOCDELTA_INDENT: z
    .string()
    .default("2")
    .transform((v) => Number(v))
    .pipe(z.number().int().min(0).max(10)),
  DOCDELTA_DIFF_OUT: z.string().min(1).default("diff_export.json"),
  DOCDELTA_RECONSTRUCT_OUT: z.string().min(1).default("reconstructed.json"),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  return parsed.data;
}
