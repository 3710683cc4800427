/**
 * Path: src/errors/types.ts
 * 익스포터 에러 타입 정의
 */

export enum ErrorCode {
    // 설정 관련
    CONFIG_INVALID = "CONFIG_INVALID",

    // 플랫폼 API 관련
    AUTH_FAILED = "AUTH_FAILED",
    FETCH_FAILED = "FETCH_FAILED",
    INVALID_RESPONSE = "INVALID_RESPONSE",

    // 집계 관련
    PARSE_FAILED = "PARSE_FAILED",

    // 메트릭 서버 관련
    SERVER_ERROR = "SERVER_ERROR",

    INTERNAL_ERROR = "INTERNAL_ERROR",
}

export enum ErrorSeverity {
    LOW = "LOW",
    MEDIUM = "MEDIUM",
    HIGH = "HIGH",
    CRITICAL = "CRITICAL",
}

export class MonitorError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly originalError?: Error,
        public readonly severity: ErrorSeverity = ErrorSeverity.MEDIUM
    ) {
        super(message);
        this.name = "MonitorError";
    }

    toString(): string {
        return `${this.name}[${this.code}]: ${this.message}`;
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
