import { z } from "zod";
import { loadSharedConfig, type SharedConfig } from "./shared.js";

const smtpEnvSchema = z.object({
  SMTP_HOST: z.string().default("0.0.0.0"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(2525),
  SMTP_BANNER: z.string().default("mailroute SMTP sink"),
  SMTP_REVERSE_LOOKUP: z.preprocess(
    (v) => (v === undefined ? "false" : v),
    z.string().transform((v) => v === "true")
  ),
});

type SmtpEnv = z.infer<typeof smtpEnvSchema>;

type SmtpSpecificConfig = {
  smtp: {
    host: SmtpEnv["SMTP_HOST"];
    port: SmtpEnv["SMTP_PORT"];
    banner: SmtpEnv["SMTP_BANNER"];
    reverseLookup: SmtpEnv["SMTP_REVERSE_LOOKUP"];
  };
};

export type SmtpConfig = SharedConfig & SmtpSpecificConfig;

let cachedSmtpConfig: SmtpConfig | undefined;

export function loadSmtpConfig(): SmtpConfig {
  if (cachedSmtpConfig) {
    return cachedSmtpConfig;
  }

  const sharedConfig = loadSharedConfig();
  const parsed = smtpEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;

  cachedSmtpConfig = {
    ...sharedConfig,
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      banner: env.SMTP_BANNER,
      reverseLookup: env.SMTP_REVERSE_LOOKUP,
    },
  };

  return cachedSmtpConfig;
}
