import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Logger } from "./logger";
import type { Outcome, SeatCounts, SeatSnapshot } from "./types";
import { createSnapshot, emptySnapshot, errorMessage, formatCheckTime, success } from "./utils";

const count = z.number().int().nonnegative();

export const SnapshotFileSchema = z.object({
    available_standard: count,
    available_premium: count,
    sold: count,
    timestamp: z.string().optional(),
    last_check: z.string().optional(),
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

// Files written before seats were grouped by category were keyed by chart colour
const LegacySnapshotFileSchema = z.object({
    yellow: count,
    red: count,
    grey: count,
    timestamp: z.string().optional(),
});

function parseCapturedAt(timestamp: string | undefined): Date {
    if (!timestamp) return new Date(0);
    const date = new Date(timestamp);
    return Number.isNaN(date.getTime()) ? new Date(0) : date;
}

export function parseSnapshotFile(data: unknown): SeatSnapshot | null {
    const current = SnapshotFileSchema.safeParse(data);
    if (current.success) {
        const { available_standard, available_premium, sold, timestamp } = current.data;
        return createSnapshot({ available_standard, available_premium, sold }, parseCapturedAt(timestamp));
    }

    const legacy = LegacySnapshotFileSchema.safeParse(data);
    if (legacy.success) {
        const counts: SeatCounts = {
            available_standard: legacy.data.yellow,
            available_premium: legacy.data.red,
            sold: legacy.data.grey,
        };
        return createSnapshot(counts, parseCapturedAt(legacy.data.timestamp));
    }

    return null;
}

export function toSnapshotFile(snapshot: SeatSnapshot): SnapshotFile {
    return {
        ...snapshot.counts,
        timestamp: snapshot.capturedAt.toISOString(),
        last_check: formatCheckTime(snapshot.capturedAt),
    };
}

/**
 * Load the last persisted snapshot.
 * A missing file is not an error: the first run compares against zero counts.
 */
export async function loadSnapshot(filePath: string, logger: Logger): Promise<Outcome<SeatSnapshot>> {
    if (!existsSync(filePath)) {
        logger.info("No previous data file found, using defaults");
        return success(emptySnapshot());
    }

    let raw: string;
    try {
        raw = await readFile(filePath, "utf-8");
    } catch (error) {
        const message = `Error loading previous data from ${filePath}: ${errorMessage(error)}`;
        logger.error(message);
        return { ok: false, reason: "read", message };
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        const message = `Previous data in ${filePath} is not valid JSON: ${errorMessage(error)}`;
        logger.error(message);
        return { ok: false, reason: "parse", message };
    }

    const snapshot = parseSnapshotFile(data);
    if (!snapshot) {
        const message = `Previous data in ${filePath} does not look like a seat snapshot`;
        logger.error(message);
        return { ok: false, reason: "parse", message };
    }

    logger.info(`Loaded previous data: ${JSON.stringify(snapshot.counts)}`);
    return success(snapshot);
}

/** Overwrite the persisted snapshot. Failures are logged and reported, never thrown. */
export async function saveSnapshot(
    filePath: string,
    snapshot: SeatSnapshot,
    logger: Logger
): Promise<Outcome<void>> {
    try {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, JSON.stringify(toSnapshotFile(snapshot), null, 2), "utf-8");
        logger.info(`Saved current data: ${JSON.stringify(snapshot.counts)}`);
        return success(undefined);
    } catch (error) {
        const message = `Error saving current data to ${filePath}: ${errorMessage(error)}`;
        logger.error(message);
        return { ok: false, reason: "write", message };
    }
}
