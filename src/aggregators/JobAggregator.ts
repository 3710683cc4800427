/**
 * Path: src/aggregators/JobAggregator.ts
 * 잡 메트릭 집계 (일반 잡 상태 + sync 전용 지표)
 */
import {
    PlatformJob,
    JOB_STATUS,
    SYNC_JOB_TYPE,
    UNKNOWN_LABEL,
} from "../api/types";
import { MonitorError } from "../errors/types";
import { MonitoringMetrics } from "../metrics/MonitoringMetrics";
import { Logger } from "../utils/logger";
import { parseDurationSeconds, parseTimestamp } from "../utils/time";
import { ConnectionIndex } from "./ConnectionIndex";
import { IAggregator, JobSummary } from "./types";

export type ParseFaultHandler = (job: PlatformJob, error: MonitorError) => void;

function increment(map: Map<string, number>, key: string): void {
    map.set(key, (map.get(key) ?? 0) + 1);
}

/**
 * 잡 목록 한 번 순회로 요약을 계산한다.
 * 타임스탬프/기간 파싱 실패는 해당 잡의 해당 값만 건너뛴다.
 */
export function summarizeJobs(
    jobs: readonly PlatformJob[],
    onParseFault: ParseFaultHandler = () => undefined
): JobSummary {
    const summary: JobSummary = {
        runningJobs: 0,
        pendingJobs: 0,
        workflowFailures: 0,
        successfulSyncs: 0,
        failedSyncs: 0,
        totalBytesSynced: 0,
        totalRowsSynced: 0,
        avgSuccessfulSyncDuration: 0,
        lastSuccessfulSync: new Map(),
        successfulSyncsPerConnection: new Map(),
        failedSyncsPerConnection: new Map(),
        parseFaults: 0,
    };
    const durations: number[] = [];

    const tryParse = (job: PlatformJob, parse: () => number): number | null => {
        try {
            return parse();
        } catch (error) {
            if (!(error instanceof MonitorError)) {
                throw error;
            }
            summary.parseFaults++;
            onParseFault(job, error);
            return null;
        }
    };

    for (const job of jobs) {
        switch (job.status) {
            case JOB_STATUS.RUNNING:
                summary.runningJobs++;
                break;
            case JOB_STATUS.PENDING:
                summary.pendingJobs++;
                break;
            case JOB_STATUS.FAILED:
                summary.workflowFailures++;
                break;
        }

        if (job.jobType !== SYNC_JOB_TYPE) {
            continue;
        }

        const connectionKey = job.connectionId ?? UNKNOWN_LABEL;

        if (job.status === JOB_STATUS.SUCCEEDED) {
            summary.successfulSyncs++;
            increment(summary.successfulSyncsPerConnection, connectionKey);
            summary.totalBytesSynced += job.bytesSynced ?? 0;
            summary.totalRowsSynced += job.rowsSynced ?? 0;

            const updatedAt = job.lastUpdatedAt;
            if (job.connectionId && updatedAt) {
                const ts = tryParse(job, () => parseTimestamp(updatedAt));
                const previous = summary.lastSuccessfulSync.get(job.connectionId);
                if (ts !== null && (previous === undefined || ts > previous)) {
                    summary.lastSuccessfulSync.set(job.connectionId, ts);
                }
            }

            const duration = job.duration;
            if (duration) {
                const seconds = tryParse(job, () =>
                    parseDurationSeconds(duration)
                );
                if (seconds !== null) {
                    durations.push(seconds);
                }
            }
        } else if (job.status === JOB_STATUS.FAILED) {
            summary.failedSyncs++;
            increment(summary.failedSyncsPerConnection, connectionKey);
        }
    }

    // 성공한 sync 가 없으면 0
    summary.avgSuccessfulSyncDuration =
        durations.length > 0
            ? durations.reduce((sum, d) => sum + d, 0) / durations.length
            : 0;

    return summary;
}

export class JobAggregator implements IAggregator<PlatformJob, JobSummary> {
    private readonly logger = Logger.getInstance("JobAggregator");

    constructor(
        private readonly metrics: MonitoringMetrics,
        private readonly index: ConnectionIndex
    ) {}

    update(jobs: readonly PlatformJob[]): JobSummary {
        const summary = summarizeJobs(jobs, (job, error) =>
            this.logger.warn("Skipping unparseable job field", {
                jobId: job.jobId,
                connectionId: job.connectionId,
                error: error.message,
            })
        );

        this.metrics.runningJobs.set(summary.runningJobs);
        this.metrics.pendingJobs.set(summary.pendingJobs);
        this.metrics.workflowFailures.set(summary.workflowFailures);
        this.metrics.successfulSyncs.set(summary.successfulSyncs);
        this.metrics.failedSyncs.set(summary.failedSyncs);
        this.metrics.totalBytesSynced.set(summary.totalBytesSynced);
        this.metrics.totalRowsSynced.set(summary.totalRowsSynced);
        this.metrics.avgSuccessfulSyncDuration.set(
            summary.avgSuccessfulSyncDuration
        );

        // 커넥션별 메트릭 (이름은 이번 주기의 ConnectionIndex 에서 조회)
        for (const [connectionId, ts] of summary.lastSuccessfulSync) {
            this.metrics.lastSuccessfulSyncTimestamp
                .labels({
                    connection_id: connectionId,
                    name: this.index.resolve(connectionId),
                })
                .set(ts);
        }
        for (const [connectionId, count] of summary.successfulSyncsPerConnection
            .entries()) {
            this.metrics.successfulSyncsPerConnection
                .labels({
                    connection_id: connectionId,
                    name: this.index.resolve(connectionId),
                })
                .set(count);
        }
        for (const [connectionId, count] of summary.failedSyncsPerConnection) {
            this.metrics.failedSyncsPerConnection
                .labels({
                    connection_id: connectionId,
                    name: this.index.resolve(connectionId),
                })
                .set(count);
        }

        return summary;
    }
}
