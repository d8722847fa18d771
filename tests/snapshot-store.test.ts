import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { MemoryLogger } from "../logger";
import { loadSnapshot, parseSnapshotFile, saveSnapshot, toSnapshotFile } from "../snapshot-store";
import { createSnapshot } from "../utils";

describe("snapshot store", () => {
    let dir: string;
    let dataFile: string;
    let logger: MemoryLogger;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), "seat-monitor-"));
        dataFile = path.join(dir, "seat_data.json");
        logger = new MemoryLogger();
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe("loadSnapshot", () => {
        it("should return zero counts when no file exists", async () => {
            const result = await loadSnapshot(dataFile, logger);

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.value.counts).toEqual({ available_standard: 0, available_premium: 0, sold: 0 });
            }
            expect(logger.messages("info")).toEqual(["No previous data file found, using defaults"]);
        });

        it("should report invalid JSON as a parse failure", async () => {
            writeFileSync(dataFile, "{not json", "utf-8");

            const result = await loadSnapshot(dataFile, logger);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.reason).toBe("parse");
            expect(logger.messages("error")).toHaveLength(1);
        });

        it("should reject records with negative counts", async () => {
            writeFileSync(dataFile, JSON.stringify({ available_standard: -1, available_premium: 0, sold: 0 }));

            const result = await loadSnapshot(dataFile, logger);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.reason).toBe("parse");
        });

        it("should report an unreadable path as a read failure", async () => {
            mkdirSync(dataFile);

            const result = await loadSnapshot(dataFile, logger);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.reason).toBe("read");
        });

        it("should accept files keyed by chart colour", async () => {
            writeFileSync(dataFile, JSON.stringify({ yellow: 5, red: 2, grey: 10, timestamp: "2025-01-02T03:04:05.000Z" }));

            const result = await loadSnapshot(dataFile, logger);

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.value.counts).toEqual({ available_standard: 5, available_premium: 2, sold: 10 });
                expect(result.value.capturedAt.toISOString()).toBe("2025-01-02T03:04:05.000Z");
            }
        });
    });

    describe("saveSnapshot", () => {
        it("should write counts with both timestamps", async () => {
            const capturedAt = new Date(2025, 0, 2, 3, 4, 5);
            const result = await saveSnapshot(
                dataFile,
                createSnapshot({ available_standard: 3, available_premium: 2, sold: 12 }, capturedAt),
                logger
            );

            expect(result.ok).toBe(true);
            expect(JSON.parse(readFileSync(dataFile, "utf-8"))).toEqual({
                available_standard: 3,
                available_premium: 2,
                sold: 12,
                timestamp: capturedAt.toISOString(),
                last_check: "2025-01-02 03:04:05",
            });
        });

        it("should create the parent directory", async () => {
            const nested = path.join(dir, "nested", "deeper", "seat_data.json");

            const result = await saveSnapshot(
                nested,
                createSnapshot({ available_standard: 1, available_premium: 0, sold: 0 }),
                logger
            );

            expect(result.ok).toBe(true);
            expect(JSON.parse(readFileSync(nested, "utf-8")).available_standard).toBe(1);
        });

        it("should report a write failure instead of throwing", async () => {
            const blocker = path.join(dir, "blocker");
            writeFileSync(blocker, "");

            const result = await saveSnapshot(
                path.join(blocker, "seat_data.json"),
                createSnapshot({ available_standard: 1, available_premium: 0, sold: 0 }),
                logger
            );

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.reason).toBe("write");
            expect(logger.messages("error")).toHaveLength(1);
        });

        it("should load back the counts it saved", async () => {
            const counts = { available_standard: 7, available_premium: 4, sold: 91 };
            await saveSnapshot(dataFile, createSnapshot(counts), logger);

            const first = await loadSnapshot(dataFile, logger);
            expect(first.ok).toBe(true);
            if (!first.ok) return;

            await saveSnapshot(dataFile, first.value, logger);
            const second = await loadSnapshot(dataFile, logger);

            expect(second.ok).toBe(true);
            if (second.ok) expect(second.value.counts).toEqual(counts);
        });
    });

    describe("parseSnapshotFile", () => {
        it("should fall back to the epoch for a bad timestamp", () => {
            const snapshot = parseSnapshotFile({
                available_standard: 1,
                available_premium: 1,
                sold: 1,
                timestamp: "yesterday-ish",
            });

            expect(snapshot?.capturedAt.getTime()).toBe(0);
        });

        it("should return null for unrelated data", () => {
            expect(parseSnapshotFile({ seats: 3 })).toBeNull();
            expect(parseSnapshotFile(null)).toBeNull();
        });

        it("should serialise what it parses", () => {
            const snapshot = parseSnapshotFile({
                available_standard: 2,
                available_premium: 3,
                sold: 4,
                timestamp: "2025-06-01T12:00:00.000Z",
            });

            expect(snapshot).not.toBeNull();
            if (snapshot) {
                expect(toSnapshotFile(snapshot)).toMatchObject({
                    available_standard: 2,
                    available_premium: 3,
                    sold: 4,
                    timestamp: "2025-06-01T12:00:00.000Z",
                });
            }
        });
    });
});
