/**
 * Path: tests/errors/ErrorHandler.test.ts
 * ErrorHandler 클래스의 테스트
 */

import { ErrorHandler } from "../../src/errors/ErrorHandler";
import {
    MonitorError,
    ErrorCode,
    ErrorSeverity,
} from "../../src/errors/types";

describe("ErrorHandler", () => {
    let errorHandler: ErrorHandler;
    let onFatalErrorMock: jest.Mock;
    let onErrorMock: jest.Mock;

    beforeEach(() => {
        onFatalErrorMock = jest.fn(() => Promise.resolve()); // Promise 반환
        onErrorMock = jest.fn();
        errorHandler = new ErrorHandler(onFatalErrorMock, onErrorMock);
    });

    test("handleError processes and returns a MonitorError", () => {
        const genericError = new Error("A generic error occurred");

        const result = errorHandler.handleError(genericError);

        expect(result).toBeInstanceOf(MonitorError);
        expect(result.code).toBe(ErrorCode.INTERNAL_ERROR);
        expect(result.message).toBe("A generic error occurred");
        expect(result.originalError).toBe(genericError);
        expect(result.severity).toBe(ErrorSeverity.MEDIUM);
        expect(onErrorMock).toHaveBeenCalledWith(result);
        expect(onFatalErrorMock).not.toHaveBeenCalled();
    });

    test("handleError passes through MonitorError", () => {
        const monitorError = new MonitorError(
            ErrorCode.FETCH_FAILED,
            "Error fetching data from jobs: status 500",
            undefined,
            ErrorSeverity.HIGH
        );

        const result = errorHandler.handleError(monitorError);

        expect(result).toBe(monitorError);
        expect(onErrorMock).toHaveBeenCalledWith(monitorError);
    });

    test("handleError wraps non-Error values", () => {
        const result = errorHandler.handleError("plain string");

        expect(result.code).toBe(ErrorCode.INTERNAL_ERROR);
        expect(result.message).toBe("Unknown error occurred: plain string");
        expect(result.severity).toBe(ErrorSeverity.LOW);
    });

    test("critical errors are routed to the fatal callback", () => {
        const configError = new MonitorError(
            ErrorCode.CONFIG_INVALID,
            "AIRBYTE_CLIENT_ID or AIRBYTE_CLIENT_SECRET not set",
            undefined,
            ErrorSeverity.CRITICAL
        );

        errorHandler.handleError(configError);

        expect(onErrorMock).toHaveBeenCalledWith(configError);
        expect(onFatalErrorMock).toHaveBeenCalledWith(configError);
    });

    test("handleFatalError wraps plain errors as CRITICAL", () => {
        const criticalError = new Error("Critical system failure");

        errorHandler.handleFatalError(criticalError);

        expect(onFatalErrorMock).toHaveBeenCalled();
        expect(onErrorMock).toHaveBeenCalledWith(
            expect.objectContaining({
                message: "Fatal error occurred",
                originalError: criticalError,
                severity: ErrorSeverity.CRITICAL,
            })
        );
    });

    test("MonitorError.toString includes the code", () => {
        const error = new MonitorError(ErrorCode.AUTH_FAILED, "denied");

        expect(error.toString()).toBe("MonitorError[AUTH_FAILED]: denied");
    });
});
