import winston from "winston";
import { SCANNER_CONFIG } from "./config.js";

const silent = SCANNER_CONFIG.logLevel === "silent";

// stdout is reserved for the rendered report
const logger = winston.createLogger({
  level: silent ? "error" : SCANNER_CONFIG.logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: "HH:mm:ss" }),
    winston.format.errors({ stack: true }),
  ),
  transports: [
    new winston.transports.Console({
      silent,
      stderrLevels: ["error", "warn", "info", "debug"],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, module: mod, stack }) => {
          const tag = mod ? ` [${mod}]` : "";
          if (stack) return `${timestamp} ${level}:${tag} ${message}\n${stack}`;
          return `${timestamp} ${level}:${tag} ${message}`;
        })
      ),
    }),
  ],
});

export default logger;
