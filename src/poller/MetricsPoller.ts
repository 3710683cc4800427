/**
 * Path: src/poller/MetricsPoller.ts
 * 폴링 루프: 토큰 갱신 -> 4개 리소스 조회 -> 집계 -> 대기 -> 반복
 */
import { ITokenProvider } from "../auth/TokenManager";
import { FetchResult, IPlatformApiClient } from "../api/PlatformApiClient";
import {
    ResourceEndpoint,
    PlatformConnection,
    PlatformDestination,
    PlatformJob,
    PlatformSource,
} from "../api/types";
import { IAggregator, ConnectionSummary, JobSummary } from "../aggregators/types";
import { IErrorHandler } from "../errors/ErrorHandler";
import { MonitorError } from "../errors/types";
import { Logger } from "../utils/logger";

export type PollCycleStatus = "completed" | "auth_failed" | "failed";

export interface PollCycleReport {
    status: PollCycleStatus;
    failedEndpoints: ResourceEndpoint[];
    durationMs: number;
    error?: MonitorError;
}

export interface PollerAggregators {
    connections: IAggregator<PlatformConnection, ConnectionSummary>;
    jobs: IAggregator<PlatformJob, JobSummary>;
    destinations: IAggregator<PlatformDestination, number>;
    sources: IAggregator<PlatformSource, number>;
}

export class MetricsPoller {
    private readonly logger = Logger.getInstance("MetricsPoller");
    private isRunning = false;
    private sleepTimer: NodeJS.Timeout | null = null;
    private wakeUp: (() => void) | null = null;
    private loop: Promise<void> | null = null;
    private cycleCount = 0;

    constructor(
        private readonly tokenProvider: ITokenProvider,
        private readonly apiClient: IPlatformApiClient,
        private readonly aggregators: PollerAggregators,
        private readonly errorHandler: IErrorHandler,
        private readonly intervalMs: number
    ) {}

    /**
     * 폴링 1회. 어떤 실패도 throw 하지 않고 보고서로 돌려준다.
     */
    async runCycle(): Promise<PollCycleReport> {
        const startedAt = Date.now();
        const failedEndpoints: ResourceEndpoint[] = [];

        let token: string;
        try {
            token = await this.tokenProvider.getValidToken();
        } catch (error) {
            const monitorError = this.errorHandler.handleError(error);
            return {
                status: "auth_failed",
                failedEndpoints,
                durationMs: Date.now() - startedAt,
                error: monitorError,
            };
        }

        try {
            const unwrap = <T>(
                endpoint: ResourceEndpoint,
                result: FetchResult<T>
            ): T[] => {
                if (result.ok) {
                    return result.data;
                }
                failedEndpoints.push(endpoint);
                return [];
            };

            // 순차 조회
            const jobs = unwrap("jobs", await this.apiClient.fetchJobs(token));
            const connections = unwrap(
                "connections",
                await this.apiClient.fetchConnections(token)
            );
            const destinations = unwrap(
                "destinations",
                await this.apiClient.fetchDestinations(token)
            );
            const sources = unwrap(
                "sources",
                await this.apiClient.fetchSources(token)
            );

            // 커넥션 먼저: JobAggregator 가 이번 주기의 커넥션 이름을 사용
            const connectionSummary =
                this.aggregators.connections.update(connections);
            const jobSummary = this.aggregators.jobs.update(jobs);
            this.aggregators.destinations.update(destinations);
            this.aggregators.sources.update(sources);

            const durationMs = Date.now() - startedAt;
            this.logger.logPerformance("poll_cycle", durationMs, {
                jobs: jobs.length,
                connections: connectionSummary.totalConnections,
                activeConnections: connectionSummary.activeConnections,
                destinations: destinations.length,
                sources: sources.length,
                parseFaults: jobSummary.parseFaults,
                failedEndpoints,
            });

            return { status: "completed", failedEndpoints, durationMs };
        } catch (error) {
            const monitorError = this.errorHandler.handleError(error);
            return {
                status: "failed",
                failedEndpoints,
                durationMs: Date.now() - startedAt,
                error: monitorError,
            };
        }
    }

    start(): void {
        if (this.isRunning) return;
        this.isRunning = true;
        this.logger.info("Polling started", { intervalMs: this.intervalMs });
        this.loop = this.runLoop().catch((error: unknown) => {
            this.isRunning = false;
            this.errorHandler.handleFatalError(error);
        });
    }

    async stop(): Promise<void> {
        if (!this.isRunning) return;
        this.isRunning = false;

        if (this.sleepTimer) {
            clearTimeout(this.sleepTimer);
            this.sleepTimer = null;
        }
        this.wakeUp?.();
        this.wakeUp = null;

        await this.loop; // 진행 중인 주기는 끝까지 기다림
        this.loop = null;
        this.logger.info("Polling stopped", { cycles: this.cycleCount });
    }

    getCycleCount(): number {
        return this.cycleCount;
    }

    private async runLoop(): Promise<void> {
        while (this.isRunning) {
            const report = await this.runCycle();
            this.cycleCount++;
            if (report.status !== "completed") {
                this.logger.warn("Poll cycle did not complete", {
                    status: report.status,
                    error: report.error?.toString(),
                });
            }
            if (!this.isRunning) break;
            await this.sleep();
        }
    }

    private sleep(): Promise<void> {
        return new Promise((resolve) => {
            this.wakeUp = resolve;
            this.sleepTimer = setTimeout(() => {
                this.sleepTimer = null;
                this.wakeUp = null;
                resolve();
            }, this.intervalMs);
        });
    }
}
