import { appendFileSync, existsSync, mkdirSync } from "fs";
import path from "path";
import { formatCheckTime } from "./utils";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LogEntry {
    level: LogLevel;
    message: string;
}

export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
    return `${formatCheckTime(at)} - ${level.toUpperCase()} - ${message}`;
}

/**
 * Logger that appends every entry to `logFile` and mirrors it to the console.
 * If the file cannot be written, entries still reach the console.
 */
export function createFileLogger(logFile: string, options: { debug?: boolean } = {}): Logger {
    let fileWritable = true;

    const ensureDir = () => {
        const dir = path.dirname(logFile);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }
    };

    const write = (level: LogLevel, message: string) => {
        if (level === "debug" && !options.debug) return;

        const line = formatLogLine(level, message);

        if (fileWritable) {
            try {
                ensureDir();
                appendFileSync(logFile, line + "\n", "utf-8");
            } catch (error) {
                fileWritable = false;
                console.error(`Log file ${logFile} is not writable, logging to console only:`, error);
            }
        }

        if (level === "error") {
            console.error(line);
        } else if (level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };

    return {
        debug: (message) => write("debug", message),
        info: (message) => write("info", message),
        warn: (message) => write("warn", message),
        error: (message) => write("error", message),
    };
}

/** Keeps entries in memory instead of writing them anywhere. */
export class MemoryLogger implements Logger {
    readonly entries: LogEntry[] = [];

    debug(message: string): void {
        this.entries.push({ level: "debug", message });
    }

    info(message: string): void {
        this.entries.push({ level: "info", message });
    }

    warn(message: string): void {
        this.entries.push({ level: "warn", message });
    }

    error(message: string): void {
        this.entries.push({ level: "error", message });
    }

    messages(level: LogLevel): string[] {
        return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
    }
}
