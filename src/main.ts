#!/usr/bin/env node
/**
 * Path: src/main.ts
 * Purpose: 익스포터 초기화 및 실행 관리
 */

import { AppConfig } from "./config/types";
import { IConfigLoader } from "./config/IConfigLoader";
import { EnvConfigLoader } from "./config/EnvConfigLoader";
import { ErrorHandler } from "./errors/ErrorHandler";
import { MonitorError } from "./errors/types";
import { Logger } from "./utils/logger";
import { TokenManager } from "./auth/TokenManager";
import { PlatformApiClient } from "./api/PlatformApiClient";
import { MonitoringMetrics } from "./metrics/MonitoringMetrics";
import { ConnectionIndex } from "./aggregators/ConnectionIndex";
import { ConnectionAggregator } from "./aggregators/ConnectionAggregator";
import { JobAggregator } from "./aggregators/JobAggregator";
import { ResourceCountAggregator } from "./aggregators/ResourceCountAggregator";
import { MetricsPoller } from "./poller/MetricsPoller";
import { MetricsServer } from "./server/MetricsServer";

const logger = Logger.getInstance("Application");

class Application {
    private isRunning: boolean = false;
    private isShuttingDown: boolean = false; // 종료 중인지 여부
    private signalListeners: Array<[NodeJS.Signals, () => void]> = [];

    constructor(
        private readonly config: AppConfig,
        private readonly poller: MetricsPoller,
        private readonly server: MetricsServer
    ) {}

    static create(configLoader: IConfigLoader = new EnvConfigLoader()): Application {
        const config = configLoader.loadConfig();

        const errorHandler = new ErrorHandler(
            async (error: MonitorError) => {
                logger.error("Fatal error occurred", error);
                process.exit(1);
            },
            (error: MonitorError) => logger.error("Poll error", error)
        );

        const metrics = new MonitoringMetrics(undefined, {
            collectDefaultMetrics: config.metrics.collectDefaultMetrics,
        });
        const connectionIndex = new ConnectionIndex();

        const poller = new MetricsPoller(
            new TokenManager(config.platform),
            new PlatformApiClient(config.platform),
            {
                connections: new ConnectionAggregator(metrics, connectionIndex),
                jobs: new JobAggregator(metrics, connectionIndex),
                destinations: new ResourceCountAggregator(metrics.destinations),
                sources: new ResourceCountAggregator(metrics.sources),
            },
            errorHandler,
            config.metrics.updateIntervalSeconds * 1000
        );

        return new Application(config, poller, new MetricsServer(metrics));
    }

    public async start(): Promise<void> {
        if (this.isRunning) return;

        await this.server.start(this.config.metrics.port);
        this.poller.start();
        this.setupSignalHandlers();
        this.isRunning = true;

        logger.info("Exporter started", {
            apiUrl: this.config.platform.apiUrl,
            port: this.config.metrics.port,
            intervalSeconds: this.config.metrics.updateIntervalSeconds,
        });
    }

    private setupSignalHandlers(): void {
        const shutdownHandler = async (signal: string) => {
            if (this.isShuttingDown) return; // 중복 실행 방지
            this.isShuttingDown = true;

            logger.info(`Received ${signal}. Initiating graceful shutdown...`);
            await this.shutdown();
            process.exit(0);
        };

        const onSignal = (signal: string) => {
            shutdownHandler(signal).catch((error: unknown) => {
                logger.error("Error during shutdown", error);
                process.exit(1);
            });
        };

        const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
        for (const signal of signals) {
            const listener = () => onSignal(signal);
            process.on(signal, listener);
            this.signalListeners.push([signal, listener]);
        }
    }

    private removeSignalHandlers(): void {
        for (const [signal, listener] of this.signalListeners) {
            process.removeListener(signal, listener);
        }
        this.signalListeners = [];
    }

    public async shutdown(): Promise<void> {
        if (!this.isRunning) return;

        this.removeSignalHandlers();
        await this.poller.stop();

        try {
            await this.server.stop();
        } catch (error) {
            logger.error("Error stopping metrics server", error);
        }

        this.isRunning = false;
        logger.info("Shutdown process completed.");
    }

    public getMetricsPort(): number {
        return this.server.getPort();
    }

    public getStatus(): string {
        return this.isRunning ? "running" : "stopped";
    }
}

async function main(): Promise<void> {
    let app: Application;
    try {
        app = Application.create();
    } catch (error) {
        logger.error("Invalid configuration", error);
        process.exit(1);
    }

    try {
        await app.start();
    } catch (error) {
        logger.error("Exporter failed to start", error);
        process.exit(1);
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error("Unexpected error", error);
        process.exit(1);
    });
}

export { Application };
