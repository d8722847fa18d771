import "dotenv/config"; // Load environment variables
import { loadConfig } from "./config";
import { createFileLogger } from "./logger";
import { launchChromiumPage } from "./scraping";
import { intervalHours, runMonitor } from "./scripts/monitor-core";
import { errorMessage } from "./utils";

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createFileLogger(config.logFile, { debug: config.debug });

    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    console.log("Seat Availability Monitor");
    console.log("=".repeat(40));
    console.log(`Checking seat availability every ${intervalHours(config)} hours.`);
    console.log("Press Ctrl+C to stop monitoring.");
    console.log("=".repeat(40));

    await runMonitor(
        {
            config,
            logger,
            openPage: launchChromiumPage,
            out: (line) => console.log(line),
        },
        controller.signal
    );

    console.log("\nSeat monitoring stopped. Goodbye!");
}

main().catch((error) => {
    console.error("Fatal error:", errorMessage(error));
    process.exit(1);
});
