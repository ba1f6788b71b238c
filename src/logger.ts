// Winston logger for the report pipeline. Every level goes to stderr so that
// stdout carries only the rendered report.
import winston from "winston";

const logLevel = process.env.LOG_LEVEL || "info";
const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST;

const formats: winston.Logform.Format[] = [];

if (!isProduction) {
  formats.push(winston.format.colorize());
}

formats.push(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  }),
);

export const logger = winston.createLogger({
  level: logLevel,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(...formats),
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
  silent: isTest && !process.env.DEBUG_TESTS,
});

/** Child logger tagging each line with the module it came from. */
export const createLogger = (module: string) => logger.child({ module });

export default logger;
