/**
 * Path: src/aggregators/ResourceCountAggregator.ts
 * 목록 길이만 게이지로 내보내는 집계기 (destinations, sources)
 */
import { Gauge } from "prom-client";
import { IAggregator } from "./types";

export class ResourceCountAggregator<TItem>
    implements IAggregator<TItem, number>
{
    constructor(private readonly gauge: Gauge) {}

    update(items: readonly TItem[]): number {
        this.gauge.set(items.length);
        return items.length;
    }
}
