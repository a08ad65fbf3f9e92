import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const sharedEnvSchema = z.object({
  MAILBOXES: z.string().default(""),
  MAILBOXES_FILE: z.string().default(""),
  MAILBOX_MAX_MESSAGES: z.coerce.number().int().min(1).default(500),
  ROUTING_REGEX_TIMEOUT_MS: z.coerce.number().int().min(1).max(60000).default(1000),
  MAX_MESSAGE_SIZE_MB: z.coerce.number().min(1).default(25),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

type SharedEnv = z.infer<typeof sharedEnvSchema>;

export type SharedConfig = {
  env: SharedEnv["NODE_ENV"];
  logLevel: SharedEnv["LOG_LEVEL"];
  mailboxes: {
    inline: string;
    file: string | undefined;
    maxMessages: number;
  };
  routing: { regexTimeoutMs: number };
  messageSize: { maxBytes: number };
};

let cachedSharedConfig: SharedConfig | undefined;

export function loadSharedConfig(): SharedConfig {
  if (cachedSharedConfig) {
    return cachedSharedConfig;
  }

  const parsed = sharedEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;

  cachedSharedConfig = {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    mailboxes: {
      inline: env.MAILBOXES,
      file: env.MAILBOXES_FILE || undefined,
      maxMessages: env.MAILBOX_MAX_MESSAGES,
    },
    routing: {
      regexTimeoutMs: env.ROUTING_REGEX_TIMEOUT_MS,
    },
    messageSize: {
      maxBytes: env.MAX_MESSAGE_SIZE_MB * 1024 * 1024,
    },
  };

  return cachedSharedConfig;
}
