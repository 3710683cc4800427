/**
 * Path: src/aggregators/ConnectionIndex.ts
 * connectionId -> 커넥션 이름 매핑 (매 폴링 주기마다 재구성)
 */
import { UNKNOWN_LABEL } from "../api/types";

export class ConnectionIndex {
    private names = new Map<string, string>();

    clear(): void {
        this.names.clear();
    }

    set(connectionId: string, name: string): void {
        this.names.set(connectionId, name);
    }

    resolve(connectionId: string | undefined): string {
        if (connectionId === undefined) {
            return UNKNOWN_LABEL;
        }
        return this.names.get(connectionId) ?? UNKNOWN_LABEL;
    }

    get size(): number {
        return this.names.size;
    }
}
