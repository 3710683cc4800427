// src/utils/logger.ts

import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export type LogMeta = Record<string, unknown>;

export class Logger {
    private logger: winston.Logger;
    private static instances: Map<string, Logger> = new Map();

    private constructor(module: string) {
        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || "info",
            silent: process.env.NODE_ENV === "test",
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            defaultMeta: { module },
            transports: this.getTransports(process.env.LOG_DIR),
        });
    }

    static getInstance(module: string): Logger {
        const existing = Logger.instances.get(module);
        if (existing) {
            return existing;
        }
        const logger = new Logger(module);
        Logger.instances.set(module, logger);
        return logger;
    }

    private getTransports(logDir?: string): winston.transport[] {
        const transports: winston.transport[] = [
            // 콘솔 출력
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.simple()
                ),
            }),
        ];

        if (!logDir) {
            return transports;
        }

        transports.push(
            // 일별 로그 파일
            new DailyRotateFile({
                dirname: logDir,
                filename: "exporter-%DATE%.log",
                datePattern: "YYYY-MM-DD",
                zippedArchive: true,
                maxSize: "20m",
                maxFiles: "14d",
            }),

            // 에러 로그 파일
            new DailyRotateFile({
                dirname: logDir,
                filename: "error-%DATE%.log",
                datePattern: "YYYY-MM-DD",
                zippedArchive: true,
                maxSize: "20m",
                maxFiles: "14d",
                level: "error",
            })
        );

        return transports;
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(message, meta);
    }

    error(message: string, error?: unknown): void {
        if (error instanceof Error) {
            this.logger.error(message, {
                error: error.toString(),
                stack: error.stack,
            });
            return;
        }
        if (error === undefined) {
            this.logger.error(message);
            return;
        }
        this.logger.error(message, { error: String(error) });
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, meta);
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, meta);
    }

    // 성능 로깅
    logPerformance(operation: string, duration: number, meta?: LogMeta): void {
        this.logger.info("Performance", {
            operation,
            duration,
            ...meta,
        });
    }
}
