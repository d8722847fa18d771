/**
 * Core Monitor Logic
 *
 * One check cycle (fetch, compare with the last snapshot, report, persist) and the
 * loop that repeats it until the operator interrupts the process.
 */

import type { Logger } from "../logger";
import { diffAndNotify, printSummary } from "../reporter";
import { fetchSeatData } from "../scraping";
import type { PageFactory } from "../scraping";
import { loadSnapshot, saveSnapshot } from "../snapshot-store";
import type { CycleReport, MonitorConfig, ReportOutput } from "../types";
import { createSnapshot, emptyCounts, emptySnapshot, errorMessage, formatCheckTime, sleep } from "../utils";

export interface MonitorDeps {
    config: MonitorConfig;
    logger: Logger;
    openPage: PageFactory;
    out: ReportOutput;
    now?: () => Date;
}

/**
 * Run a single check: fetch, load previous, report, diff, save.
 * Fetch and persistence failures fall back to zero counts and do not reject.
 */
export async function runCycle(deps: MonitorDeps): Promise<CycleReport> {
    const { config, logger, openPage, out } = deps;
    const now = deps.now ?? (() => new Date());

    out("");
    out(`Checking seat availability at ${formatCheckTime(now())}`);

    const fetched = await fetchSeatData(config, openPage, logger);
    const current = createSnapshot(fetched.ok ? fetched.value.counts : emptyCounts(), now());

    const loaded = await loadSnapshot(config.dataFile, logger);
    const previous = loaded.ok ? loaded.value : emptySnapshot();

    printSummary(current, out);
    const notifications = diffAndNotify(current, previous, out);

    const saved = await saveSnapshot(config.dataFile, current, logger);

    return { current, previous, notifications, fetch: fetched, saved: saved.ok };
}

export function intervalHours(config: MonitorConfig): number {
    return config.intervalMs / (60 * 60 * 1000);
}

/**
 * Run checks every `config.intervalMs` until `signal` aborts.
 * The signal is checked before each cycle and interrupts the wait between cycles.
 * A cycle that throws is logged and the loop carries on to the wait.
 *
 * @returns the number of cycles that ran
 */
export async function runMonitor(deps: MonitorDeps, signal: AbortSignal): Promise<number> {
    const { config, logger, out } = deps;
    const now = deps.now ?? (() => new Date());
    const hours = intervalHours(config);

    logger.info("Starting seat monitor");
    logger.info(`Monitoring URL: ${config.url}`);
    logger.info(`Check interval: ${hours} hours`);

    let cycles = 0;
    while (!signal.aborted) {
        try {
            await runCycle(deps);
        } catch (error) {
            logger.error(`Unexpected error in check cycle: ${errorMessage(error)}`);
        }
        cycles++;

        if (signal.aborted) break;

        const nextCheck = new Date(now().getTime() + config.intervalMs);
        out("");
        out(`Waiting for ${hours} hours before next check...`);
        out(`Next check scheduled for: ${formatCheckTime(nextCheck)}`);
        out("-".repeat(50));

        await sleep(config.intervalMs, signal);
    }

    logger.info("Monitoring stopped by user");
    return cycles;
}
