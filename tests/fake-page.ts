import type { SeatChartPage, SeatElement } from "../scraping";
import type { MonitorConfig } from "../types";

export interface FakeSeat {
    fill?: string;
    class?: string;
}

export interface FakePageOptions {
    /** Selectors that `waitForSelector` finds */
    present?: string[];
    /** Elements returned by `queryAll`, per selector */
    seats?: Record<string, FakeSeat[]>;
    /** Selectors whose query throws */
    failing?: Record<string, Error>;
    html?: string;
    gotoError?: Error;
}

/** In-memory stand-in for a browser page showing a seat map. */
export class FakeSeatChartPage implements SeatChartPage {
    readonly visited: string[] = [];
    readonly waited: string[] = [];
    readonly queried: string[] = [];
    closed = false;

    constructor(private readonly options: FakePageOptions = {}) {}

    async goto(url: string): Promise<void> {
        this.visited.push(url);
        if (this.options.gotoError) throw this.options.gotoError;
    }

    async waitForSelector(selector: string): Promise<boolean> {
        this.waited.push(selector);
        return (this.options.present ?? []).includes(selector);
    }

    async queryAll(selector: string): Promise<SeatElement[]> {
        this.queried.push(selector);
        const failure = this.options.failing?.[selector];
        if (failure) throw failure;

        return (this.options.seats?.[selector] ?? []).map((seat) => ({
            getAttribute: async (name: string) => {
                if (name === "fill") return seat.fill ?? null;
                if (name === "class") return seat.class ?? null;
                return null;
            },
        }));
    }

    async content(): Promise<string> {
        return this.options.html ?? "<html><body></body></html>";
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export function testConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
    return {
        url: "https://tickets.test/event/42",
        intervalMs: 5,
        dataFile: "/nonexistent/seat_data.json",
        logFile: "/nonexistent/seat_monitor.log",
        navigationTimeoutMs: 1000,
        selectorTimeoutMs: 10,
        userAgent: "test-agent",
        browserExecutablePath: null,
        debug: false,
        ...overrides,
    };
}
