/**
 * Path: src/auth/TokenManager.ts
 * OAuth client-credentials 토큰 관리
 */
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { PlatformConfig } from "../config/types";
import { MonitorError, ErrorCode, ErrorSeverity, toError } from "../errors/types";
import { Logger } from "../utils/logger";

/** 만료 60초 전부터는 토큰을 재발급한다 */
export const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;

export interface ITokenProvider {
    getValidToken(): Promise<string>;
}

export interface AccessToken {
    readonly value: string;
    readonly expiresAt: number; // epoch ms
}

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
});

export class TokenManager implements ITokenProvider {
    private token: AccessToken | null = null;
    private readonly http: AxiosInstance;
    private readonly logger = Logger.getInstance("TokenManager");

    constructor(
        private readonly config: PlatformConfig,
        private readonly now: () => number = Date.now
    ) {
        this.http = axios.create({ timeout: config.requestTimeoutMs });
    }

    get tokenUrl(): string {
        return `${this.config.apiUrl}/applications/token`;
    }

    async getValidToken(): Promise<string> {
        if (!this.token || this.needsRefresh(this.token)) {
            this.token = await this.requestToken();
        }
        return this.token.value;
    }

    getCurrentToken(): AccessToken | null {
        return this.token;
    }

    private needsRefresh(token: AccessToken): boolean {
        return this.now() >= token.expiresAt - TOKEN_REFRESH_MARGIN_MS;
    }

    private async requestToken(): Promise<AccessToken> {
        let payload: unknown;
        try {
            const response = await this.http.post<unknown>(
                this.tokenUrl,
                new URLSearchParams({
                    client_id: this.config.clientId,
                    client_secret: this.config.clientSecret,
                    grant_type: "client_credentials",
                })
            );
            payload = response.data;
        } catch (error) {
            const reason = axios.isAxiosError(error)
                ? error.response
                    ? `status ${error.response.status}`
                    : error.message
                : toError(error).message;
            throw new MonitorError(
                ErrorCode.AUTH_FAILED,
                `Token request failed: ${reason}`,
                toError(error),
                ErrorSeverity.HIGH
            );
        }

        const parsed = tokenResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new MonitorError(
                ErrorCode.AUTH_FAILED,
                "Token response is missing access_token or expires_in",
                parsed.error,
                ErrorSeverity.HIGH
            );
        }

        const token: AccessToken = {
            value: parsed.data.access_token,
            expiresAt: this.now() + parsed.data.expires_in * 1000,
        };
        this.logger.info("New token fetched", {
            expiresAt: new Date(token.expiresAt).toISOString(),
        });
        return token;
    }
}
