/**
 * Path: src/config/EnvConfigLoader.ts
 * EnvConfigLoader 구현
 */
import dotenv from "dotenv";
import { AppConfig } from "./types";
import { IConfigLoader } from "./IConfigLoader";
import { MonitorError, ErrorCode, ErrorSeverity } from "../errors/types";

export const DEFAULT_API_URL = "https://api.airbyte.com/v1";
export const DEFAULT_PROMETHEUS_PORT = 8000;
export const DEFAULT_UPDATE_INTERVAL_SECONDS = 60;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export class EnvConfigLoader implements IConfigLoader {
    constructor(
        envPath?: string,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) {
        if (envPath) {
            dotenv.config({ path: envPath });
        } else {
            dotenv.config();
        }
    }

    loadConfig(): AppConfig {
        const clientId = this.env.AIRBYTE_CLIENT_ID;
        const clientSecret = this.env.AIRBYTE_CLIENT_SECRET;

        if (!clientId || !clientSecret) {
            throw new MonitorError(
                ErrorCode.CONFIG_INVALID,
                "AIRBYTE_CLIENT_ID or AIRBYTE_CLIENT_SECRET not set",
                undefined,
                ErrorSeverity.CRITICAL
            );
        }

        return {
            platform: {
                apiUrl: (this.env.AIRBYTE_API_URL || DEFAULT_API_URL).replace(
                    /\/+$/,
                    ""
                ),
                clientId,
                clientSecret,
                requestTimeoutMs: this.readPositiveInt(
                    "REQUEST_TIMEOUT_MS",
                    DEFAULT_REQUEST_TIMEOUT_MS
                ),
            },
            metrics: {
                port: this.readPositiveInt(
                    "PROMETHEUS_PORT",
                    DEFAULT_PROMETHEUS_PORT
                ),
                updateIntervalSeconds: this.readPositiveInt(
                    "METRICS_UPDATE_INTERVAL",
                    DEFAULT_UPDATE_INTERVAL_SECONDS
                ),
                collectDefaultMetrics:
                    this.env.COLLECT_DEFAULT_METRICS === "true",
            },
        };
    }

    private readPositiveInt(name: string, fallback: number): number {
        const raw = this.env[name];
        if (raw === undefined || raw === "") {
            return fallback;
        }

        const value = Number(raw);
        if (!Number.isInteger(value) || value <= 0) {
            throw new MonitorError(
                ErrorCode.CONFIG_INVALID,
                `${name} must be a positive integer, got "${raw}"`,
                undefined,
                ErrorSeverity.CRITICAL
            );
        }
        return value;
    }
}
