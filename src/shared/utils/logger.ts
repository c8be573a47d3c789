import pino from "pino";

const isDevelopment = process.env.NODE_ENV !== "production";
const isCI = process.env.CI === "true" || process.env.GITHUB_ACTIONS === "true";

// Reports go to stdout, so logs are written to stderr
export const logger = pino(
  {
    name: "post-tools",
    level: process.env.LOG_LEVEL || (isDevelopment ? "debug" : "info"),
    transport:
      isDevelopment && !isCI
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
              destination: 2,
            },
          }
        : undefined,
  },
  isDevelopment && !isCI ? undefined : pino.destination(2)
);
