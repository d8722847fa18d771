import { emptyCounts } from "./utils";
import type { Category, ElementAttributes, SeatCounts } from "./types";

/**
 * Seat status heuristics.
 *
 * Colours and class names are matched as lower-cased substrings. The mapping is a
 * best guess at how seat maps tend to be drawn; it has no guarantee of matching what a
 * particular page means by a colour.
 */

const HEX_COLOUR = /^#([0-9a-f]{3}|[0-9a-f]{6})$/;

/**
 * Map a `#rgb` / `#rrggbb` fill onto the nearest named hue the colour rules know about.
 * Anything else is returned unchanged.
 */
export function normalizeFill(fill: string): string {
    const value = fill.trim().toLowerCase();
    const match = value.match(HEX_COLOUR);
    if (!match) return value;

    let hex = match[1];
    if (hex.length === 3) {
        hex = hex
            .split("")
            .map((c) => c + c)
            .join("");
    }

    const r = parseInt(hex.slice(0, 2), 16);
    const g = parseInt(hex.slice(2, 4), 16);
    const b = parseInt(hex.slice(4, 6), 16);
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);

    if (max - min < 32) return "grey";
    if (r >= 160 && g >= 160 && b < 100) return "yellow";
    if (r === max && g < max && b < max) return "red";
    if (g === max && r < max && b < max) return "green";
    if (b === max && r < max && g < max) return "blue";

    return value;
}

const includesAny = (value: string, needles: string[]) => needles.some((needle) => value.includes(needle));

export function classifyByFill(fill: string | null): Category | null {
    if (!fill) return null;
    const colour = normalizeFill(fill);
    if (!colour) return null;

    if (includesAny(colour, ["yellow", "gold"])) return "available_standard";
    if (includesAny(colour, ["red", "crimson"])) return "available_premium";
    if (includesAny(colour, ["grey", "gray", "silver"])) return "sold";
    // Fallbacks: other cool colours usually mean free, anything else taken
    if (includesAny(colour, ["green", "blue"])) return "available_standard";
    return "sold";
}

export function classifyByClass(className: string | null): Category | null {
    if (!className) return null;
    const name = className.toLowerCase();

    if (includesAny(name, ["available", "free"])) {
        return includesAny(name, ["premium", "vip"]) ? "available_premium" : "available_standard";
    }
    if (includesAny(name, ["sold", "taken", "occupied"])) return "sold";
    return null;
}

/**
 * Classify one seat marker. A class-derived status overrides the colour-derived one.
 * Returns null when neither attribute says anything, in which case the marker is not counted.
 */
export function classifySeat(attrs: ElementAttributes): Category | null {
    return classifyByClass(attrs.className) ?? classifyByFill(attrs.fill);
}

export function tallySeats(seats: ElementAttributes[]): SeatCounts {
    const counts = emptyCounts();
    for (const seat of seats) {
        const category = classifySeat(seat);
        if (category) counts[category]++;
    }
    return counts;
}
