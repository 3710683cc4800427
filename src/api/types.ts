/**
 * Path: src/api/types.ts
 * Airbyte 공개 API 리소스 스키마
 *
 * 모든 필드는 선택적이며, 타입이 맞지 않는 필드는 누락된 것으로 취급한다.
 */
import { z } from "zod";

export const RESOURCE_ENDPOINTS = [
    "jobs",
    "connections",
    "destinations",
    "sources",
] as const;

export type ResourceEndpoint = (typeof RESOURCE_ENDPOINTS)[number];

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

export const jobSchema = z.object({
    jobId: z.union([z.number(), z.string()]).optional().catch(undefined),
    status: optionalString,
    jobType: optionalString,
    connectionId: optionalString,
    startTime: optionalString,
    lastUpdatedAt: optionalString,
    duration: optionalString,
    bytesSynced: optionalNumber,
    rowsSynced: optionalNumber,
});

export const connectionSchema = z.object({
    connectionId: optionalString,
    name: optionalString,
    status: optionalString,
    sourceId: optionalString,
    destinationId: optionalString,
    schedule: z
        .object({ scheduleType: optionalString })
        .optional()
        .catch(undefined),
    dataResidency: optionalString,
    nonBreakingSchemaUpdatesBehavior: optionalString,
    namespaceDefinition: optionalString,
    prefix: optionalString,
    createdAt: optionalNumber,
    configurations: z
        .object({ streams: z.array(z.unknown()).optional().catch(undefined) })
        .optional()
        .catch(undefined),
});

export const destinationSchema = z.object({
    destinationId: optionalString,
    name: optionalString,
    destinationType: optionalString,
});

export const sourceSchema = z.object({
    sourceId: optionalString,
    name: optionalString,
    sourceType: optionalString,
});

export type PlatformJob = z.infer<typeof jobSchema>;
export type PlatformConnection = z.infer<typeof connectionSchema>;
export type PlatformDestination = z.infer<typeof destinationSchema>;
export type PlatformSource = z.infer<typeof sourceSchema>;

export const JOB_STATUS = {
    RUNNING: "running",
    PENDING: "pending",
    FAILED: "failed",
    SUCCEEDED: "succeeded",
} as const;

export const SYNC_JOB_TYPE = "sync";
export const ACTIVE_CONNECTION_STATUS = "active";
export const UNKNOWN_LABEL = "unknown";
