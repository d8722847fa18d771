import { CATEGORIES } from "./types";
import type { Category, ReportOutput, SeatSnapshot } from "./types";
import { formatCheckTime } from "./utils";

export const CATEGORY_LABELS: Record<Category, string> = {
    available_standard: "Standard (yellow)",
    available_premium: "Premium (red)",
    sold: "Sold (grey)",
};

export const NO_CHANGES_MESSAGE = "No changes detected since last check";

const RULE = "=".repeat(50);

export interface SeatChange {
    category: Category;
    delta: number;
}

const consoleOutput: ReportOutput = (line) => console.log(line);

export function formatSummary(snapshot: SeatSnapshot): string[] {
    const { counts } = snapshot;
    return [
        RULE,
        "SEAT AVAILABILITY REPORT",
        RULE,
        `${CATEGORY_LABELS.available_standard} available: ${counts.available_standard}`,
        `${CATEGORY_LABELS.available_premium} available: ${counts.available_premium}`,
        `${CATEGORY_LABELS.sold}: ${counts.sold}`,
        `Check time: ${formatCheckTime(snapshot.capturedAt)}`,
        RULE,
    ];
}

export function printSummary(snapshot: SeatSnapshot, out: ReportOutput = consoleOutput): void {
    for (const line of formatSummary(snapshot)) {
        out(line);
    }
}

export function diffSnapshots(current: SeatSnapshot, previous: SeatSnapshot): SeatChange[] {
    const changes: SeatChange[] = [];
    for (const category of CATEGORIES) {
        const delta = current.counts[category] - previous.counts[category];
        if (delta !== 0) {
            changes.push({ category, delta });
        }
    }
    return changes;
}

/**
 * Operator message for one change. A drop in an available category and a rise in the
 * sold count both mean tickets went.
 */
export function describeChange({ category, delta }: SeatChange): string {
    const amount = Math.abs(delta);
    const signed = delta > 0 ? `+${delta}` : `${delta}`;

    if (category === "sold") {
        return delta > 0
            ? `${amount} new tickets sold since last check (${signed})`
            : `${amount} sold seats released since last check (${signed})`;
    }

    const label = CATEGORY_LABELS[category];
    return delta > 0
        ? `More ${label} seats available (${signed})`
        : `${label}: ${amount} sold since last check (${signed})`;
}

/** Print one message per changed category, or a single no-change message. */
export function diffAndNotify(
    current: SeatSnapshot,
    previous: SeatSnapshot,
    out: ReportOutput = consoleOutput
): string[] {
    const changes = diffSnapshots(current, previous);
    const messages = changes.length > 0 ? changes.map(describeChange) : [NO_CHANGES_MESSAGE];

    for (const message of messages) {
        out(message);
    }
    return messages;
}
