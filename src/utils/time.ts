/**
 * Path: src/utils/time.ts
 * ISO-8601 타임스탬프/기간 파싱
 */
import { getUnixTime, isValid, parseISO } from "date-fns";
import { parse as parseIsoDuration, toSeconds } from "iso8601-duration";
import { MonitorError, ErrorCode, ErrorSeverity, toError } from "../errors/types";

/**
 * "2023-01-01T00:00:00Z" 형식을 Unix 초(정수)로 변환
 */
export function parseTimestamp(iso: string): number {
    const date = parseISO(iso);
    if (!isValid(date)) {
        throw new MonitorError(
            ErrorCode.PARSE_FAILED,
            `Invalid ISO-8601 timestamp: "${iso}"`,
            undefined,
            ErrorSeverity.LOW
        );
    }
    return getUnixTime(date);
}

/**
 * "PT1H2M30S" 형식을 초 단위로 변환
 */
export function parseDurationSeconds(iso: string): number {
    // 라이브러리가 부호를 무시하므로 음수 기간은 직접 거부
    if (iso.trimStart().startsWith("-")) {
        throw new MonitorError(
            ErrorCode.PARSE_FAILED,
            `Negative ISO-8601 duration: "${iso}"`,
            undefined,
            ErrorSeverity.LOW
        );
    }

    let seconds: number;
    try {
        seconds = toSeconds(parseIsoDuration(iso));
    } catch (error) {
        throw new MonitorError(
            ErrorCode.PARSE_FAILED,
            `Invalid ISO-8601 duration: "${iso}"`,
            toError(error),
            ErrorSeverity.LOW
        );
    }

    if (!Number.isFinite(seconds)) {
        throw new MonitorError(
            ErrorCode.PARSE_FAILED,
            `Invalid ISO-8601 duration: "${iso}"`,
            undefined,
            ErrorSeverity.LOW
        );
    }
    return seconds;
}
