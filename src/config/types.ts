/**
 * Path: src/config/types.ts
 * Configuration 타입 정의
 */

export interface AppConfig {
    platform: PlatformConfig;
    metrics: MetricsConfig;
}

export interface PlatformConfig {
    apiUrl: string; // Airbyte API base url (e.g. https://api.airbyte.com/v1)
    clientId: string;
    clientSecret: string;
    requestTimeoutMs: number;
}

export interface MetricsConfig {
    port: number; // Prometheus scrape port
    updateIntervalSeconds: number;
    collectDefaultMetrics: boolean; // Node 프로세스 메트릭 포함 여부
}
