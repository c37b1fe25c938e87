/**
 * @fileoverview Winston-backed singleton logger with RFC 5424 level names.
 * Log files (JSON lines) are written under the configured logs directory.
 * A console transport is added only for interactive terminals and never
 * while the MCP stdio transport owns stdout.
 * @module src/utils/internal/logger
 */

import { existsSync, mkdirSync } from "fs";
import path from "path";
import winston from "winston";
import { config, type LogLevel } from "../../config/index.js";
import type { RequestContext } from "./requestContext.js";

export type McpLogLevel = LogLevel;

type WinstonLevel = "error" | "warn" | "info" | "debug";

const mcpToWinstonLevel: Record<McpLogLevel, WinstonLevel> = {
  debug: "debug",
  info: "info",
  notice: "info",
  warning: "warn",
  error: "error",
  crit: "error",
  alert: "error",
  emerg: "error",
};

type LogContext = RequestContext | Record<string, unknown>;

export interface LoggerInitOptions {
  /** Adds a colorized console transport. Ignored unless stdout is a TTY. */
  console?: boolean;
}

function ensureLogsDirectory(dirPath: string): string | null {
  try {
    if (!existsSync(dirPath)) {
      mkdirSync(dirPath, { recursive: true });
    }
    return dirPath;
  } catch (error: unknown) {
    if (process.stdout.isTTY) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Could not create logs directory ${dirPath}: ${message}`);
    }
    return null;
  }
}

export class Logger {
  private static instance: Logger | undefined;
  private winstonLogger?: winston.Logger;
  private initialized = false;
  private currentLevel: McpLogLevel = "info";

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public initialize(
    level: McpLogLevel = config.logLevel,
    options: LoggerInitOptions = {},
  ): void {
    if (this.initialized) {
      this.setLevel(level);
      return;
    }
    this.currentLevel = level;

    const transports: Array<
      | winston.transports.FileTransportInstance
      | winston.transports.ConsoleTransportInstance
    > = [];
    const fileFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    );

    const logsDir = ensureLogsDirectory(config.logsPath);
    if (logsDir) {
      transports.push(
        new winston.transports.File({
          filename: path.join(logsDir, "error.log"),
          level: "error",
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: path.join(logsDir, "combined.log"),
          format: fileFormat,
        }),
      );
    }

    if (options.console && process.stdout.isTTY) {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level: lvl, message }) => {
              return `${lvl}: ${String(message)}`;
            }),
          ),
        }),
      );
    }

    this.winstonLogger = winston.createLogger({
      level: mcpToWinstonLevel[level],
      transports,
      exitOnError: false,
      silent: transports.length === 0,
    });
    this.initialized = true;
    this.info(`Logger initialized at level '${level}'.`, {
      logsDir: logsDir ?? "disabled",
    });
  }

  public setLevel(level: McpLogLevel): void {
    this.currentLevel = level;
    if (this.winstonLogger) {
      this.winstonLogger.level = mcpToWinstonLevel[level];
    }
  }

  public get level(): McpLogLevel {
    return this.currentLevel;
  }

  private log(
    level: McpLogLevel,
    msg: string,
    context?: LogContext,
    error?: Error,
  ): void {
    if (!this.initialized || !this.winstonLogger) {
      return;
    }
    const meta: Record<string, unknown> = { ...context, mcpLevel: level };
    if (error) {
      meta.error = { name: error.name, message: error.message, stack: error.stack };
    }
    this.winstonLogger.log(mcpToWinstonLevel[level], msg, meta);
  }

  public debug(msg: string, context?: LogContext): void {
    this.log("debug", msg, context);
  }

  public info(msg: string, context?: LogContext): void {
    this.log("info", msg, context);
  }

  public notice(msg: string, context?: LogContext): void {
    this.log("notice", msg, context);
  }

  public warning(msg: string, context?: LogContext): void {
    this.log("warning", msg, context);
  }

  public error(
    msg: string,
    err?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.logWithError("error", msg, err, context);
  }

  public crit(msg: string, err?: Error | LogContext, context?: LogContext): void {
    this.logWithError("crit", msg, err, context);
  }

  public emerg(msg: string, err?: Error | LogContext, context?: LogContext): void {
    this.logWithError("emerg", msg, err, context);
  }

  /** Alias of `emerg` for unrecoverable startup failures. */
  public fatal(msg: string, err?: Error | LogContext, context?: LogContext): void {
    this.logWithError("emerg", msg, err, context);
  }

  private logWithError(
    level: McpLogLevel,
    msg: string,
    err?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (err instanceof Error) {
      this.log(level, msg, context, err);
    } else {
      this.log(level, msg, err ?? context);
    }
  }
}

export const logger = Logger.getInstance();
