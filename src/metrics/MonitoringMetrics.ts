/**
 * Path: src/metrics/MonitoringMetrics.ts
 * Prometheus 게이지 정의
 *
 * 레이블 조합은 누적되며 삭제하지 않는다. 삭제된 커넥션의 시리즈는
 * 프로세스 재시작 전까지 남는다.
 */
import { Gauge, Registry, collectDefaultMetrics } from "prom-client";

const CONNECTION_LABELS = ["connection_id", "name"] as const;

export interface MonitoringMetricsOptions {
    collectDefaultMetrics?: boolean;
}

export class MonitoringMetrics {
    // ========================================================================
    // JOB METRICS
    // ========================================================================
    readonly runningJobs: Gauge;
    readonly pendingJobs: Gauge;
    readonly workflowFailures: Gauge;
    readonly successfulSyncs: Gauge;
    readonly failedSyncs: Gauge;
    readonly lastSuccessfulSyncTimestamp: Gauge<"connection_id" | "name">;
    readonly totalBytesSynced: Gauge;
    readonly totalRowsSynced: Gauge;
    readonly avgSuccessfulSyncDuration: Gauge;
    readonly successfulSyncsPerConnection: Gauge<"connection_id" | "name">;
    readonly failedSyncsPerConnection: Gauge<"connection_id" | "name">;

    // ========================================================================
    // CONNECTION METRICS
    // ========================================================================
    readonly activeConnections: Gauge;
    readonly connectionStatus: Gauge<
        "connection_id" | "name" | "source_id" | "destination_id" | "schedule_type"
    >;
    readonly connectionInfo: Gauge<
        | "connection_id"
        | "data_residency"
        | "non_breaking_schema_updates_behavior"
        | "namespace_definition"
        | "prefix"
    >;
    readonly connectionStreamsCount: Gauge<"connection_id" | "name">;
    readonly connectionCreatedAt: Gauge<"connection_id" | "name">;

    // ========================================================================
    // DESTINATION / SOURCE METRICS
    // ========================================================================
    readonly destinations: Gauge;
    readonly sources: Gauge;

    constructor(
        readonly registry: Registry = new Registry(),
        options: MonitoringMetricsOptions = {}
    ) {
        if (options.collectDefaultMetrics) {
            collectDefaultMetrics({ register: registry });
        }

        const registers = [registry];

        this.runningJobs = new Gauge({
            name: "monitoring_num_running_jobs",
            help: "Number of running jobs",
            registers,
        });
        this.pendingJobs = new Gauge({
            name: "monitoring_num_pending_jobs",
            help: "Number of pending jobs",
            registers,
        });
        this.workflowFailures = new Gauge({
            name: "monitoring_temporal_workflow_failure",
            help: "Number of failed jobs",
            registers,
        });
        this.successfulSyncs = new Gauge({
            name: "monitoring_num_successful_syncs",
            help: "Number of successful sync jobs",
            registers,
        });
        this.failedSyncs = new Gauge({
            name: "monitoring_num_failed_syncs",
            help: "Number of failed sync jobs",
            registers,
        });
        this.lastSuccessfulSyncTimestamp = new Gauge({
            name: "monitoring_last_successful_sync_timestamp",
            help: "Timestamp of last successful sync per connection",
            labelNames: CONNECTION_LABELS,
            registers,
        });
        this.totalBytesSynced = new Gauge({
            name: "monitoring_total_bytes_synced",
            help: "Total bytes synced across all successful sync jobs",
            registers,
        });
        this.totalRowsSynced = new Gauge({
            name: "monitoring_total_rows_synced",
            help: "Total rows synced across all successful sync jobs",
            registers,
        });
        this.avgSuccessfulSyncDuration = new Gauge({
            name: "monitoring_avg_successful_sync_duration",
            help: "Average duration of successful sync jobs in seconds",
            registers,
        });
        this.successfulSyncsPerConnection = new Gauge({
            name: "monitoring_successful_syncs_per_connection",
            help: "Number of successful syncs per connection",
            labelNames: CONNECTION_LABELS,
            registers,
        });
        this.failedSyncsPerConnection = new Gauge({
            name: "monitoring_failed_syncs_per_connection",
            help: "Number of failed syncs per connection",
            labelNames: CONNECTION_LABELS,
            registers,
        });

        this.activeConnections = new Gauge({
            name: "monitoring_active_connections",
            help: "Number of active connections",
            registers,
        });
        this.connectionStatus = new Gauge({
            name: "monitoring_connection_status",
            help: "Status of connections (1 for active, 0 for inactive)",
            labelNames: [
                "connection_id",
                "name",
                "source_id",
                "destination_id",
                "schedule_type",
            ] as const,
            registers,
        });
        this.connectionInfo = new Gauge({
            name: "monitoring_connection_info",
            help: "Info about connections",
            labelNames: [
                "connection_id",
                "data_residency",
                "non_breaking_schema_updates_behavior",
                "namespace_definition",
                "prefix",
            ] as const,
            registers,
        });
        this.connectionStreamsCount = new Gauge({
            name: "monitoring_connection_streams_count",
            help: "Number of streams per connection",
            labelNames: CONNECTION_LABELS,
            registers,
        });
        this.connectionCreatedAt = new Gauge({
            name: "monitoring_connection_created_at",
            help: "Creation timestamp of the connection",
            labelNames: CONNECTION_LABELS,
            registers,
        });

        this.destinations = new Gauge({
            name: "monitoring_num_destinations",
            help: "Number of destinations",
            registers,
        });
        this.sources = new Gauge({
            name: "monitoring_num_sources",
            help: "Number of sources",
            registers,
        });
    }

    /**
     * Prometheus text format
     */
    render(): Promise<string> {
        return this.registry.metrics();
    }

    get contentType(): string {
        return this.registry.contentType;
    }
}
