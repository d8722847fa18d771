import * as cheerio from "cheerio";
import { chromium, errors } from "playwright-core";
import type { Browser } from "playwright-core";
import { tallySeats } from "./classifier";
import type { Logger } from "./logger";
import type { ElementAttributes, FetchResult, MonitorConfig, Outcome } from "./types";
import { errorMessage, success } from "./utils";

// Probed in order; the first that appears marks the chart as loaded
export const CHART_SELECTORS = [
    "svg",
    "[class*='seat']",
    "[class*='chart']",
    ".seatmap",
    "[data-testid*='seat']",
];

// Probed in order; specific SVG seat shapes before generic fallbacks
export const SEAT_SELECTORS = [
    "svg g[class*='seat']",
    "svg circle[class*='seat']",
    "svg rect[class*='seat']",
    "[class*='seat']",
    "svg [fill]",
    "svg [class*='available']",
    "svg [class*='sold']",
];

export interface SeatElement {
    getAttribute(name: string): Promise<string | null>;
}

/** The slice of a browser page the seat fetcher needs. */
export interface SeatChartPage {
    /** Navigate and wait until the network is idle. */
    goto(url: string, timeoutMs: number): Promise<void>;
    /** Resolves false if nothing matched within the timeout. */
    waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
    queryAll(selector: string): Promise<SeatElement[]>;
    content(): Promise<string>;
    close(): Promise<void>;
}

export type PageFactory = (config: MonitorConfig) => Promise<SeatChartPage>;

/**
 * Launch headless Chromium and open a fresh page. Closing the page closes the browser.
 */
export const launchChromiumPage: PageFactory = async (config) => {
    const browser: Browser = await chromium.launch({
        headless: true,
        executablePath: config.browserExecutablePath ?? undefined,
    });

    try {
        const page = await browser.newPage();
        await page.setExtraHTTPHeaders({ "User-Agent": config.userAgent });

        return {
            goto: async (url, timeoutMs) => {
                await page.goto(url, { waitUntil: "networkidle", timeout: timeoutMs });
            },
            waitForSelector: async (selector, timeoutMs) => {
                try {
                    await page.waitForSelector(selector, { timeout: timeoutMs });
                    return true;
                } catch (error) {
                    if (error instanceof errors.TimeoutError) return false;
                    throw error;
                }
            },
            queryAll: (selector) => page.$$(selector),
            content: () => page.content(),
            close: () => browser.close(),
        };
    } catch (error) {
        await browser.close();
        throw error;
    }
};

async function readAttributes(element: SeatElement): Promise<ElementAttributes> {
    const fill = await element.getAttribute("fill");
    const className = await element.getAttribute("class");
    return { fill, className };
}

async function locateChart(page: SeatChartPage, timeoutMs: number, logger: Logger): Promise<string | null> {
    for (const selector of CHART_SELECTORS) {
        if (await page.waitForSelector(selector, timeoutMs)) {
            logger.info(`Found seating chart with selector: ${selector}`);
            return selector;
        }
    }
    return null;
}

async function findSeats(
    page: SeatChartPage,
    logger: Logger
): Promise<{ selector: string; seats: ElementAttributes[] } | null> {
    for (const selector of SEAT_SELECTORS) {
        try {
            const elements = await page.queryAll(selector);
            if (elements.length === 0) continue;

            logger.info(`Found ${elements.length} elements with selector: ${selector}`);
            const seats: ElementAttributes[] = [];
            for (const element of elements) {
                seats.push(await readAttributes(element));
            }
            return { selector, seats };
        } catch (error) {
            logger.debug(`Error with selector ${selector}: ${errorMessage(error)}`);
        }
    }
    return null;
}

/**
 * Look at the raw HTML when no selector matched, to tell "selectors are stale" apart
 * from "there is no chart on this page".
 */
export function pageMentionsSeatChart(html: string): boolean {
    const $ = cheerio.load(html);
    if ($("[class*='seat'], [class*='chart'], [id*='seat'], [id*='chart']").length > 0) {
        return true;
    }
    const text = $("body").text().toLowerCase();
    return text.includes("seat") || text.includes("chart");
}

async function scrapeSeatChart(
    page: SeatChartPage,
    config: MonitorConfig,
    logger: Logger
): Promise<FetchResult> {
    const chartSelector = await locateChart(page, config.selectorTimeoutMs, logger);
    if (!chartSelector) {
        logger.warn("Could not find seating chart, trying to extract any available data...");
    }

    const found = await findSeats(page, logger);

    if (!found) {
        logger.warn("No seats found, inspecting page content...");
        if (pageMentionsSeatChart(await page.content())) {
            logger.info("Page contains seat-related content, but selectors may need adjustment");
        } else {
            logger.warn("Page may not contain a seating chart or may be loading differently");
        }
    }

    const seats = found?.seats ?? [];
    return {
        counts: tallySeats(seats),
        chartLocated: chartSelector !== null,
        chartSelector,
        seatSelector: found?.selector ?? null,
        elementsMatched: seats.length,
    };
}

/**
 * Load the seating chart and count seats per category.
 * Never rejects: any failure comes back as an outcome the caller can log and replace
 * with zero counts.
 */
export async function fetchSeatData(
    config: MonitorConfig,
    openPage: PageFactory,
    logger: Logger
): Promise<Outcome<FetchResult>> {
    let page: SeatChartPage;
    try {
        page = await openPage(config);
    } catch (error) {
        const message = `Error launching browser: ${errorMessage(error)}`;
        logger.error(message);
        return { ok: false, reason: "browser", message };
    }

    try {
        logger.info(`Loading page: ${config.url}`);
        try {
            await page.goto(config.url, config.navigationTimeoutMs);
        } catch (error) {
            const message = `Error loading ${config.url}: ${errorMessage(error)}`;
            logger.error(message);
            return { ok: false, reason: "navigation", message };
        }

        const result = await scrapeSeatChart(page, config, logger);
        logger.info(`Seat data extracted: ${JSON.stringify(result.counts)}`);
        return success(result);
    } catch (error) {
        const message = `Error fetching seat data: ${errorMessage(error)}`;
        logger.error(message);
        return { ok: false, reason: "browser", message };
    } finally {
        try {
            await page.close();
        } catch (error) {
            logger.warn(`Error closing browser: ${errorMessage(error)}`);
        }
    }
}
