import path from "path";
import type { MonitorConfig } from "./types";

const DEFAULT_URL = "https://www.example-tickets.test/event/sample-show-20391162/";
const DEFAULT_USER_AGENT =
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const HOUR_MS = 60 * 60 * 1000;

type Env = Record<string, string | undefined>;

function readPositiveNumber(
    env: Env,
    key: string,
    fallback: number,
    warn: (message: string) => void
): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
        warn(`${key}="${raw}" is not a positive number, using ${fallback}`);
        return fallback;
    }
    return value;
}

/**
 * Build the monitor configuration from environment variables.
 * Called once at start-up; the result is frozen and passed down explicitly.
 */
export function loadConfig(
    env: Env = process.env,
    warn: (message: string) => void = console.warn
): MonitorConfig {
    const intervalHours = readPositiveNumber(env, "CHECK_INTERVAL_HOURS", 3, warn);
    const navigationTimeoutMs = readPositiveNumber(env, "NAVIGATION_TIMEOUT_MS", 60000, warn);
    const selectorTimeoutMs = readPositiveNumber(env, "SELECTOR_TIMEOUT_MS", 10000, warn);

    return Object.freeze({
        url: env.MONITOR_URL || DEFAULT_URL,
        intervalMs: intervalHours * HOUR_MS,
        dataFile: path.resolve(env.DATA_FILE || path.join("data", "seat_data.json")),
        logFile: path.resolve(env.LOG_FILE || path.join("data", "seat_monitor.log")),
        navigationTimeoutMs,
        selectorTimeoutMs,
        userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
        browserExecutablePath: env.CHROMIUM_PATH || null,
        debug: env.LOG_LEVEL === "debug",
    });
}
