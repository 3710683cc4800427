/**
 * Path: tests/aggregators/ConnectionAggregator.test.ts
 */
import { ConnectionAggregator } from "../../src/aggregators/ConnectionAggregator";
import { ConnectionIndex } from "../../src/aggregators/ConnectionIndex";
import { PlatformConnection } from "../../src/api/types";
import { MonitoringMetrics } from "../../src/metrics/MonitoringMetrics";
import { gaugeValue, seriesCount } from "../helpers/metrics";

describe("ConnectionAggregator", () => {
    let metrics: MonitoringMetrics;
    let index: ConnectionIndex;
    let aggregator: ConnectionAggregator;

    const fullConnection: PlatformConnection = {
        connectionId: "c1",
        name: "Foo",
        status: "active",
        sourceId: "s1",
        destinationId: "d1",
        schedule: { scheduleType: "cron" },
        dataResidency: "auto",
        nonBreakingSchemaUpdatesBehavior: "ignore",
        namespaceDefinition: "destination",
        prefix: "raw_",
        createdAt: 1700000000,
        configurations: { streams: [{ name: "users" }, { name: "orders" }] },
    };

    const bareConnection: PlatformConnection = {
        connectionId: "c2",
        status: "inactive",
    };

    beforeEach(() => {
        metrics = new MonitoringMetrics();
        index = new ConnectionIndex();
        aggregator = new ConnectionAggregator(metrics, index);
    });

    test("활성 커넥션 수 집계", async () => {
        const summary = aggregator.update([fullConnection, bareConnection]);

        expect(summary).toEqual({ totalConnections: 2, activeConnections: 1 });
        expect(await gaugeValue(metrics.activeConnections)).toBe(1);
    });

    test("커넥션 상태 게이지와 레이블", async () => {
        aggregator.update([fullConnection, bareConnection]);

        expect(
            await gaugeValue(metrics.connectionStatus, {
                connection_id: "c1",
                name: "Foo",
                source_id: "s1",
                destination_id: "d1",
                schedule_type: "cron",
            })
        ).toBe(1);
        expect(
            await gaugeValue(metrics.connectionStatus, {
                connection_id: "c2",
                name: "unknown",
                source_id: "unknown",
                destination_id: "unknown",
                schedule_type: "unknown",
            })
        ).toBe(0);
    });

    test("info 메트릭은 항상 1", async () => {
        aggregator.update([fullConnection, bareConnection]);

        expect(
            await gaugeValue(metrics.connectionInfo, {
                connection_id: "c1",
                data_residency: "auto",
                non_breaking_schema_updates_behavior: "ignore",
                namespace_definition: "destination",
                prefix: "raw_",
            })
        ).toBe(1);
        expect(
            await gaugeValue(metrics.connectionInfo, {
                connection_id: "c2",
                data_residency: "unknown",
                non_breaking_schema_updates_behavior: "unknown",
                namespace_definition: "unknown",
                prefix: "unknown",
            })
        ).toBe(1);
    });

    test("스트림 수와 생성 시각 (누락 시 0)", async () => {
        aggregator.update([fullConnection, bareConnection]);

        expect(
            await gaugeValue(metrics.connectionStreamsCount, {
                connection_id: "c1",
                name: "Foo",
            })
        ).toBe(2);
        expect(
            await gaugeValue(metrics.connectionStreamsCount, {
                connection_id: "c2",
                name: "unknown",
            })
        ).toBe(0);
        expect(
            await gaugeValue(metrics.connectionCreatedAt, {
                connection_id: "c1",
                name: "Foo",
            })
        ).toBe(1700000000);
        expect(
            await gaugeValue(metrics.connectionCreatedAt, {
                connection_id: "c2",
                name: "unknown",
            })
        ).toBe(0);
    });

    test("ConnectionIndex 를 매 주기 재구성", () => {
        aggregator.update([fullConnection, bareConnection]);
        expect(index.resolve("c1")).toBe("Foo");
        expect(index.resolve("c2")).toBe("unknown");
        expect(index.size).toBe(2);

        aggregator.update([bareConnection]);
        expect(index.resolve("c1")).toBe("unknown");
        expect(index.size).toBe(1);
    });

    test("삭제된 커넥션의 시리즈는 남아 있음", async () => {
        aggregator.update([fullConnection]);
        aggregator.update([]);

        expect(await gaugeValue(metrics.activeConnections)).toBe(0);
        expect(await seriesCount(metrics.connectionStatus)).toBe(1);
    });
});
