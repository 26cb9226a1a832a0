import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const booleanFlag = z
  .string()
  .default("false")
  .transform((v) => ["1", "true", "yes"].includes(v.trim().toLowerCase()));

const EnvSchema = z
  .object({
    EXPORT_CONFIG_PATH: z.string().default("./config/export.config.json"),

    REPORT_SINK: z.enum(["csv", "sheets"]).default("csv"),
    MAX_REPORT_VERSIONS: z.coerce.number().int().positive().default(10),

    IMAGE_MODE: z
      .string()
      .default("copy")
      .transform((v) => v.trim().toLowerCase())
      .pipe(z.enum(["copy", "symlink"])),
    PRUNE_IMAGES: booleanFlag,

    GOOGLE_SHEETS_SPREADSHEET_ID: z.string().optional(),
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().optional()
  })
  .superRefine((env, ctx) => {
    if (env.REPORT_SINK !== "sheets") return;
    if (!env.GOOGLE_SHEETS_SPREADSHEET_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GOOGLE_SHEETS_SPREADSHEET_ID"],
        message: "required when REPORT_SINK=sheets"
      });
    }
    if (!env.GOOGLE_SERVICE_ACCOUNT_JSON) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GOOGLE_SERVICE_ACCOUNT_JSON"],
        message: "required when REPORT_SINK=sheets"
      });
    }
  });

export type AppConfig = z.infer<typeof EnvSchema>;

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}
