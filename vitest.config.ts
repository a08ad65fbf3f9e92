import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      SMTP_HOST: "127.0.0.1",
      SMTP_PORT: "9925",
      SMTP_REVERSE_LOOKUP: "false",
      MAILBOXES: "",
      MAILBOXES_FILE: "",
      MAILBOX_MAX_MESSAGES: "5",
      MAX_MESSAGE_SIZE_MB: "1",
      ROUTING_REGEX_TIMEOUT_MS: "1000",
      API_HOST: "127.0.0.1",
      API_PORT: "3333",
      LOG_LEVEL: "error",
      NODE_ENV: "test",
    },
    testTimeout: 30000,
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
    pool: "forks",
    fileParallelism: false,
    maxWorkers: 1,
  },
});
