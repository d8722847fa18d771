import { format } from "date-fns";
import { CATEGORIES } from "./types";
import type { Outcome, SeatCounts, SeatSnapshot } from "./types";

export const CHECK_TIME_FORMAT = "yyyy-MM-dd HH:mm:ss";

export function formatCheckTime(date: Date): string {
    return format(date, CHECK_TIME_FORMAT);
}

export function emptyCounts(): SeatCounts {
    return { available_standard: 0, available_premium: 0, sold: 0 };
}

export function createSnapshot(counts: SeatCounts, capturedAt: Date = new Date()): SeatSnapshot {
    const copy = emptyCounts();
    for (const category of CATEGORIES) {
        copy[category] = counts[category];
    }
    return Object.freeze({ counts: Object.freeze(copy), capturedAt });
}

export function emptySnapshot(): SeatSnapshot {
    return createSnapshot(emptyCounts());
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function success<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

/** Longest delay a single `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 * Resolves (never rejects) so the caller checks `signal.aborted` itself.
 * Delays past `MAX_TIMER_DELAY_MS` are waited out in consecutive timers.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        let remaining = ms;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const finish = () => {
            clearTimeout(timer);
            signal?.removeEventListener("abort", finish);
            resolve();
        };

        const arm = () => {
            const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
            remaining -= delay;
            timer = setTimeout(remaining > 0 ? arm : finish, delay);
        };

        signal?.addEventListener("abort", finish, { once: true });
        arm();
    });
}
