import pino from "pino";

const REDACT_PATHS = [
  "authorization",
  "token",
  "secret",
  "password",
  "apiKey",
  "api_key",
  "BOT_TOKEN",
  "ANTHROPIC_API_KEY",
  "headers.authorization",
  'headers["x-api-key"]',
  "env.BOT_TOKEN",
  "env.ANTHROPIC_API_KEY"
];

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  redact: {
    paths: REDACT_PATHS,
    censor: "[redacted]"
  }
});
