export const CATEGORIES = ["available_standard", "available_premium", "sold"] as const;

export type Category = (typeof CATEGORIES)[number];

export type SeatCounts = Record<Category, number>;

export interface SeatSnapshot {
    readonly counts: Readonly<SeatCounts>;
    readonly capturedAt: Date;
}

/** Attributes read from one rendered seat marker. Either may be absent. */
export interface ElementAttributes {
    fill: string | null;
    className: string | null;
}

export type FailureReason =
    | "navigation"
    | "browser"
    | "read"
    | "parse"
    | "write";

export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; reason: FailureReason; message: string };

export interface FetchResult {
    counts: SeatCounts;
    chartLocated: boolean;
    chartSelector: string | null;
    seatSelector: string | null;
    elementsMatched: number;
}

export interface CycleReport {
    current: SeatSnapshot;
    previous: SeatSnapshot;
    notifications: string[];
    fetch: Outcome<FetchResult>;
    saved: boolean;
}

export interface MonitorConfig {
    readonly url: string;
    readonly intervalMs: number;
    readonly dataFile: string;
    readonly logFile: string;
    readonly navigationTimeoutMs: number;
    readonly selectorTimeoutMs: number;
    readonly userAgent: string;
    readonly browserExecutablePath: string | null;
    readonly debug: boolean;
}

/** Text sink for operator-facing report lines. */
export type ReportOutput = (line: string) => void;
