/**
 * Path: src/aggregators/types.ts
 */

/**
 * 조회한 리소스 목록을 게이지 값으로 옮기는 집계기
 */
export interface IAggregator<TItem, TSummary> {
    update(items: readonly TItem[]): TSummary;
}

export interface ConnectionSummary {
    totalConnections: number;
    activeConnections: number;
}

export interface JobSummary {
    runningJobs: number;
    pendingJobs: number;
    workflowFailures: number;
    successfulSyncs: number;
    failedSyncs: number;
    totalBytesSynced: number;
    totalRowsSynced: number;
    avgSuccessfulSyncDuration: number;
    lastSuccessfulSync: Map<string, number>; // connectionId -> unix seconds
    successfulSyncsPerConnection: Map<string, number>;
    failedSyncsPerConnection: Map<string, number>;
    parseFaults: number;
}
