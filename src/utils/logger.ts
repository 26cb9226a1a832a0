import pino from "pino";

const redactionPaths = ["*.private_key", "*.client_email", "*.credentials", "*.authorization"];

const pretty =
  // node --test runs each file in a child with NODE_TEST_CONTEXT set; no worker transport there
  process.env.NODE_ENV !== "production" && !process.env.NODE_TEST_CONTEXT
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  redact: { paths: redactionPaths, censor: "[REDACTED]" },
  transport: pretty
});
