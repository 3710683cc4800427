/**
 * Path: src/errors/ErrorHandler.ts
 */

import { MonitorError, ErrorCode, ErrorSeverity } from "./types";

export interface IErrorHandler {
    handleError(error: unknown): MonitorError;
    handleFatalError(error: unknown): void;
}

export class ErrorHandler implements IErrorHandler {
    constructor(
        private readonly onFatalError: (error: MonitorError) => Promise<void>,
        private readonly onError: (error: MonitorError) => void
    ) {}

    handleError(error: unknown): MonitorError {
        const monitorError = this.normalizeError(error);
        if (this.isCriticalError(monitorError)) {
            this.handleFatalError(monitorError);
        } else {
            this.onError(monitorError);
        }
        return monitorError;
    }

    handleFatalError(error: unknown): void {
        const monitorError =
            error instanceof MonitorError
                ? error
                : new MonitorError(
                      ErrorCode.INTERNAL_ERROR,
                      "Fatal error occurred",
                      error instanceof Error ? error : undefined,
                      ErrorSeverity.CRITICAL
                  );
        this.onError(monitorError);
        this.onFatalError(monitorError).catch((fatalError: unknown) =>
            this.onError(this.normalizeError(fatalError))
        );
    }

    private normalizeError(error: unknown): MonitorError {
        if (error instanceof MonitorError) {
            return error; // 이미 MonitorError라면 그대로 반환
        }

        if (error instanceof Error) {
            return new MonitorError(
                ErrorCode.INTERNAL_ERROR,
                error.message,
                error,
                ErrorSeverity.MEDIUM
            );
        }

        // 알 수 없는 에러 처리
        return new MonitorError(
            ErrorCode.INTERNAL_ERROR,
            `Unknown error occurred: ${String(error)}`,
            undefined,
            ErrorSeverity.LOW
        );
    }

    private isCriticalError(error: MonitorError): boolean {
        return (
            error.severity === ErrorSeverity.CRITICAL ||
            error.code === ErrorCode.CONFIG_INVALID
        );
    }
}
