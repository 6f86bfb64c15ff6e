import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { runSnapshotBootstrap } from "../snapshot/bootstrap";
import { SnapshotHolder } from "../snapshot/holder";
import { configureLogger, getLogger } from "../utils/logger";
import { createServer, createServerContext, startServer } from "./server";

async function main(): Promise<void> {
    const configPath = resolveConfigPath(process.argv[2]);
    const config = await loadAppConfig(configPath);

    configureLogger(config.logging);
    const logger = getLogger();
    logger.info(`Loaded configuration from ${configPath}`);

    // the snapshot is installed and active before any handler exists
    const holder = new SnapshotHolder();
    const exitCode = await runSnapshotBootstrap(config.snapshot, holder, { logger });
    if (exitCode !== 0) {
        process.exitCode = exitCode;
        return;
    }

    const context = await createServerContext(config, holder, logger);
    await startServer(createServer(context, logger), config.server.port, logger);
}

main().catch((error) => {
    const logger = getLogger();
    logger.fatal({ err: error }, "Server failed to start.");
    process.exitCode = 1;
});
