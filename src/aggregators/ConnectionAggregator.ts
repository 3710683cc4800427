/**
 * Path: src/aggregators/ConnectionAggregator.ts
 * 커넥션 메트릭 집계
 *
 * ConnectionIndex 를 다시 채우므로 같은 주기의 JobAggregator 보다 먼저 실행해야 한다.
 */
import {
    PlatformConnection,
    ACTIVE_CONNECTION_STATUS,
    UNKNOWN_LABEL,
} from "../api/types";
import { MonitoringMetrics } from "../metrics/MonitoringMetrics";
import { ConnectionIndex } from "./ConnectionIndex";
import { ConnectionSummary, IAggregator } from "./types";

export class ConnectionAggregator
    implements IAggregator<PlatformConnection, ConnectionSummary>
{
    constructor(
        private readonly metrics: MonitoringMetrics,
        private readonly index: ConnectionIndex
    ) {}

    update(connections: readonly PlatformConnection[]): ConnectionSummary {
        let activeConnections = 0;
        this.index.clear(); // 매 주기마다 매핑 초기화

        for (const connection of connections) {
            const connectionId = connection.connectionId ?? UNKNOWN_LABEL;
            const name = connection.name ?? UNKNOWN_LABEL;

            this.index.set(connectionId, name);

            let statusValue = 0;
            if (connection.status === ACTIVE_CONNECTION_STATUS) {
                activeConnections++;
                statusValue = 1;
            }

            this.metrics.connectionStatus
                .labels({
                    connection_id: connectionId,
                    name,
                    source_id: connection.sourceId ?? UNKNOWN_LABEL,
                    destination_id: connection.destinationId ?? UNKNOWN_LABEL,
                    schedule_type:
                        connection.schedule?.scheduleType ?? UNKNOWN_LABEL,
                })
                .set(statusValue);

            // info 메트릭은 항상 1
            this.metrics.connectionInfo
                .labels({
                    connection_id: connectionId,
                    data_residency: connection.dataResidency ?? UNKNOWN_LABEL,
                    non_breaking_schema_updates_behavior:
                        connection.nonBreakingSchemaUpdatesBehavior ??
                        UNKNOWN_LABEL,
                    namespace_definition:
                        connection.namespaceDefinition ?? UNKNOWN_LABEL,
                    prefix: connection.prefix ?? UNKNOWN_LABEL,
                })
                .set(1);

            this.metrics.connectionStreamsCount
                .labels({ connection_id: connectionId, name })
                .set(connection.configurations?.streams?.length ?? 0);

            this.metrics.connectionCreatedAt
                .labels({ connection_id: connectionId, name })
                .set(connection.createdAt ?? 0);
        }

        this.metrics.activeConnections.set(activeConnections);

        return {
            totalConnections: connections.length,
            activeConnections,
        };
    }
}
