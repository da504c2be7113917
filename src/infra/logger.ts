// src/infra/logger.ts

import { createLogger, transports, format } from "winston";

const logFile = process.env.MCP_CLIENT_LOG_FILE;

export const logger = createLogger({
  level: process.env.MCP_CLIENT_LOG_LEVEL || "warn",
  format: format.combine(format.timestamp(), format.json()),
  transports: [
    // stdout belongs to the chat, diagnostics go to stderr
    new transports.Console({ stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"] }),
    ...(logFile ? [new transports.File({ filename: logFile })] : []),
  ],
});
