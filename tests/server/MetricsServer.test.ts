/**
 * Path: tests/server/MetricsServer.test.ts
 */
import axios from "axios";
import { MetricsServer } from "../../src/server/MetricsServer";
import { MonitoringMetrics } from "../../src/metrics/MonitoringMetrics";
import { ErrorCode, MonitorError } from "../../src/errors/types";

describe("MetricsServer", () => {
    let metrics: MonitoringMetrics;
    let server: MetricsServer;
    let port: number;

    beforeEach(async () => {
        metrics = new MonitoringMetrics();
        server = new MetricsServer(metrics);
        port = await server.start(0);
    });

    afterEach(async () => {
        await server.stop();
    });

    test("GET /metrics 는 현재 게이지 값을 텍스트로 반환", async () => {
        metrics.sources.set(3);
        metrics.connectionStatus
            .labels({
                connection_id: "c1",
                name: "Foo",
                source_id: "s1",
                destination_id: "d1",
                schedule_type: "manual",
            })
            .set(1);

        const response = await axios.get<string>(
            `http://127.0.0.1:${port}/metrics`,
            { responseType: "text" }
        );
        const lines = response.data.split("\n");

        expect(response.status).toBe(200);
        expect(response.headers["content-type"]).toBe(metrics.contentType);
        expect(lines).toContain("monitoring_num_sources 3");
        expect(lines).toContain(
            'monitoring_connection_status{connection_id="c1",name="Foo",source_id="s1",destination_id="d1",schedule_type="manual"} 1'
        );
    });

    test("다른 경로는 404", async () => {
        const response = await axios.get(`http://127.0.0.1:${port}/other`, {
            validateStatus: () => true,
        });

        expect(response.status).toBe(404);
    });

    test("렌더링 실패는 500", async () => {
        jest.spyOn(metrics, "render").mockRejectedValueOnce(new Error("boom"));

        const response = await axios.get(`http://127.0.0.1:${port}/metrics`, {
            validateStatus: () => true,
        });

        expect(response.status).toBe(500);
    });

    test("사용 중인 포트면 SERVER_ERROR", async () => {
        const second = new MetricsServer(metrics);

        const rejection = second.start(port);
        await expect(rejection).rejects.toBeInstanceOf(MonitorError);
        await expect(rejection).rejects.toMatchObject({
            code: ErrorCode.SERVER_ERROR,
        });
    });

    test("stop 후 getPort 는 0", async () => {
        expect(server.getPort()).toBe(port);
        await server.stop();
        expect(server.getPort()).toBe(0);
    });
});
