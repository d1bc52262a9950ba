import pino from "pino";

// JSON diagnostics go to stderr; stdout carries the operator-facing progress lines.
export const logger = pino(
  {
    name: "doorbell-provisioner",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "warn"),
  },
  pino.destination(2),
);
