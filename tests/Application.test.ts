/**
 * Path: tests/Application.test.ts
 */
import axios from "axios";
import path from "path";
import { Application } from "../src/main";
import { IConfigLoader } from "../src/config/IConfigLoader";
import { EnvConfigLoader } from "../src/config/EnvConfigLoader";
import { ErrorCode } from "../src/errors/types";
import { MockPlatformApiServer } from "./mock/MockPlatformApiServer";
import { captureError, waitFor } from "./helpers/async";

describe("Application", () => {
    let server: MockPlatformApiServer;
    let configLoader: jest.Mocked<IConfigLoader>;
    let app: Application | undefined;

    beforeEach(async () => {
        server = new MockPlatformApiServer();
        const baseUrl = await server.start();
        configLoader = {
            loadConfig: jest.fn().mockReturnValue({
                platform: {
                    apiUrl: baseUrl,
                    clientId: "test-client",
                    clientSecret: "test-secret",
                    requestTimeoutMs: 2000,
                },
                metrics: {
                    port: 0,
                    updateIntervalSeconds: 60,
                    collectDefaultMetrics: false,
                },
            }),
        };
    });

    afterEach(async () => {
        await app?.shutdown();
        app = undefined;
        await server.stop();
    });

    test("start 는 메트릭 서버를 열고 첫 폴링을 수행", async () => {
        server.setResource("sources", [{ sourceId: "s1" }, { sourceId: "s2" }]);
        app = Application.create(configLoader);

        await app.start();
        const port = app.getMetricsPort();
        let lines: string[] = [];
        await waitFor(async () => {
            const response = await axios.get<string>(
                `http://127.0.0.1:${port}/metrics`,
                { responseType: "text" }
            );
            lines = response.data.split("\n");
            return lines.includes("monitoring_num_sources 2");
        });

        expect(app.getStatus()).toBe("running");
        expect(lines).toContain("monitoring_num_sources 2");
        expect(server.tokenRequests).toHaveLength(1);
    });

    test("shutdown 후에는 stopped", async () => {
        app = Application.create(configLoader);
        await app.start();
        await app.shutdown();

        expect(app.getStatus()).toBe("stopped");
    });

    test("start/shutdown 반복 시 시그널 리스너가 누적되지 않음", async () => {
        const before = process.listenerCount("SIGTERM");
        const beforeInt = process.listenerCount("SIGINT");
        app = Application.create(configLoader);

        for (let i = 0; i < 3; i++) {
            await app.start();
            expect(process.listenerCount("SIGTERM")).toBe(before + 1);
            await app.shutdown();
        }

        expect(process.listenerCount("SIGTERM")).toBe(before);
        expect(process.listenerCount("SIGINT")).toBe(beforeInt);
    });

    test("자격 증명이 없으면 create 가 실패", () => {
        const error = captureError(() =>
            Application.create(
                new EnvConfigLoader(path.join(__dirname, "missing.env"), {})
            )
        );

        expect(error).toMatchObject({ code: ErrorCode.CONFIG_INVALID });
    });
});
