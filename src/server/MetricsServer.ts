/**
 * Path: src/server/MetricsServer.ts
 * Prometheus 스크레이프 엔드포인트 (GET /metrics)
 */
import express from "express";
import { Server } from "http";
import { MonitoringMetrics } from "../metrics/MonitoringMetrics";
import { MonitorError, ErrorCode, ErrorSeverity } from "../errors/types";
import { Logger } from "../utils/logger";

export const METRICS_PATH = "/metrics";

export class MetricsServer {
    private app: express.Application;
    private server: Server | null = null;
    private readonly logger = Logger.getInstance("MetricsServer");

    constructor(private readonly metrics: MonitoringMetrics) {
        this.app = express();
        this.setupRoutes();
    }

    private setupRoutes(): void {
        this.app.get(METRICS_PATH, (_req, res) => {
            this.metrics
                .render()
                .then((body) => {
                    res.set("Content-Type", this.metrics.contentType);
                    res.end(body);
                })
                .catch((error: unknown) => {
                    this.logger.error("Failed to render metrics", error);
                    res.status(500).end();
                });
        });
    }

    /**
     * @returns 실제로 바인딩된 포트 (port 0 이면 임의 포트)
     */
    start(port: number): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port);
            server.once("listening", () => {
                this.server = server;
                const actualPort = this.getPort();
                this.logger.info(
                    `Prometheus metrics server started on port ${actualPort}`
                );
                resolve(actualPort);
            });
            server.once("error", (error: Error) => {
                reject(
                    new MonitorError(
                        ErrorCode.SERVER_ERROR,
                        `Failed to start metrics server on port ${port}: ${error.message}`,
                        error,
                        ErrorSeverity.CRITICAL
                    )
                );
            });
        });
    }

    stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return Promise.resolve();
        }
        return new Promise((resolve, reject) => {
            server.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                this.server = null;
                this.logger.info("Metrics server stopped");
                resolve();
            });
        });
    }

    getPort(): number {
        const address = this.server?.address();
        if (address && typeof address === "object") {
            return address.port;
        }
        return 0;
    }
}
