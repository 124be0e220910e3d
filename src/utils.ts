import { fromUnixTime, getUnixTime } from 'date-fns';
import type { DataPoints } from './model';

export function joinUrl(baseUrl: string, apiPath: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${apiPath.replace(/^\/+/, '')}`;
}

export function toUnixSeconds(date: Date): number {
    return getUnixTime(date);
}

export function toUnixMillis(date: Date): number {
    return date.getTime();
}

/**
 * Collect the timestamps present in any of the series, ascending. Keys that
 * are not integers are skipped.
 */
export function collectTimestamps(series: (DataPoints | null | undefined)[]): number[] {
    const timestamps = new Set<number>();
    for (const points of series) {
        if (!points) continue;
        for (const key of Object.keys(points)) {
            const timestamp = Number(key);
            if (Number.isInteger(timestamp)) {
                timestamps.add(timestamp);
            }
        }
    }
    return [...timestamps].sort((a, b) => a - b);
}

export function pointAt(points: DataPoints | null | undefined, timestamp: number): number | null {
    return points?.[String(timestamp)] ?? null;
}

export function timestampToDate(timestamp: number): Date {
    return fromUnixTime(timestamp);
}

/**
 * Parse a body that may be JSON. Returns `undefined` when it is not.
 */
export function tryParseJson(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        return undefined;
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
