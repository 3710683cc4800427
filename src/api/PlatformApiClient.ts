/**
 * Path: src/api/PlatformApiClient.ts
 * Airbyte 리소스 목록 조회 클라이언트
 */
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { PlatformConfig } from "../config/types";
import { MonitorError, ErrorCode, ErrorSeverity, toError } from "../errors/types";
import { Logger } from "../utils/logger";
import {
    ResourceEndpoint,
    PlatformJob,
    PlatformConnection,
    PlatformDestination,
    PlatformSource,
    jobSchema,
    connectionSchema,
    destinationSchema,
    sourceSchema,
} from "./types";

export type FetchResult<T> =
    | { ok: true; data: T[] }
    | { ok: false; error: MonitorError };

export interface IPlatformApiClient {
    fetchJobs(token: string): Promise<FetchResult<PlatformJob>>;
    fetchConnections(token: string): Promise<FetchResult<PlatformConnection>>;
    fetchDestinations(
        token: string
    ): Promise<FetchResult<PlatformDestination>>;
    fetchSources(token: string): Promise<FetchResult<PlatformSource>>;
}

export class PlatformApiClient implements IPlatformApiClient {
    private readonly http: AxiosInstance;
    private readonly logger = Logger.getInstance("PlatformApiClient");

    constructor(config: PlatformConfig) {
        this.http = axios.create({
            baseURL: config.apiUrl,
            timeout: config.requestTimeoutMs,
        });
    }

    fetchJobs(token: string): Promise<FetchResult<PlatformJob>> {
        return this.fetch("jobs", token, jobSchema);
    }

    fetchConnections(token: string): Promise<FetchResult<PlatformConnection>> {
        return this.fetch("connections", token, connectionSchema);
    }

    fetchDestinations(
        token: string
    ): Promise<FetchResult<PlatformDestination>> {
        return this.fetch("destinations", token, destinationSchema);
    }

    fetchSources(token: string): Promise<FetchResult<PlatformSource>> {
        return this.fetch("sources", token, sourceSchema);
    }

    /**
     * `GET {apiUrl}/{endpoint}` 후 `{ data: [...] }` 봉투를 검증한다.
     * 실패는 throw 하지 않고 `ok: false` 로 돌려준다.
     */
    async fetch<T>(
        endpoint: ResourceEndpoint,
        token: string,
        itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
    ): Promise<FetchResult<T>> {
        let body: unknown;
        try {
            const response = await this.http.get<unknown>(`/${endpoint}`, {
                headers: {
                    Authorization: `Bearer ${token}`,
                    "Content-Type": "application/json",
                },
            });
            body = response.data;
        } catch (error) {
            return this.fail(endpoint, this.toFetchError(endpoint, error));
        }

        const envelope = z.object({ data: z.array(itemSchema) }).safeParse(body);
        if (!envelope.success) {
            return this.fail(
                endpoint,
                new MonitorError(
                    ErrorCode.INVALID_RESPONSE,
                    `Unexpected response body from ${endpoint}`,
                    envelope.error,
                    ErrorSeverity.MEDIUM
                )
            );
        }

        this.logger.debug(`Fetched ${endpoint}`, {
            count: envelope.data.data.length,
        });
        return { ok: true, data: envelope.data.data };
    }

    private toFetchError(endpoint: string, error: unknown): MonitorError {
        if (axios.isAxiosError(error)) {
            const reason = error.response
                ? `status ${error.response.status}`
                : error.message;
            return new MonitorError(
                ErrorCode.FETCH_FAILED,
                `Error fetching data from ${endpoint}: ${reason}`,
                error,
                ErrorSeverity.MEDIUM
            );
        }
        return new MonitorError(
            ErrorCode.FETCH_FAILED,
            `Error fetching data from ${endpoint}`,
            toError(error),
            ErrorSeverity.MEDIUM
        );
    }

    private fail<T>(endpoint: string, error: MonitorError): FetchResult<T> {
        this.logger.error(`Failed to fetch ${endpoint}`, error);
        return { ok: false, error };
    }
}
