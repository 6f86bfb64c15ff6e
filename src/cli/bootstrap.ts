#!/usr/bin/env node
import { loadAppConfig, parseRefreshPolicy, resolveConfigPath } from "../config/loadConfig";
import type { RefreshPolicy } from "../config/types";
import { runSnapshotBootstrap } from "../snapshot/bootstrap";
import { SnapshotHolder } from "../snapshot/holder";
import { configureLogger, getLogger } from "../utils/logger";

interface CliOptions {
    configPath: string;
    policy?: RefreshPolicy;
}

function printHelp(): void {
    const lines = [
        "Usage: bootstrap [--config <path-to-env>] [--policy <refresh-policy>]",
        "",
        "Installs the knowledge-base snapshot without starting the server.",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in the working directory).",
        "  -p, --policy   Overrides SNAPSHOT_REFRESH_POLICY (always-refresh, fetch-if-missing, fetch-and-swap).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let policy: RefreshPolicy | undefined;

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp();
            process.exit(0);
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        if (arg === "-p" || arg === "--policy") {
            policy = parseRefreshPolicy(argv[i + 1] ?? "");
            i += 1;
            continue;
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return { configPath: resolveConfigPath(configPath), policy };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (options.policy) {
        process.env.SNAPSHOT_REFRESH_POLICY = options.policy;
    }
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    logger.info(`Loaded configuration from ${options.configPath}`);

    process.exitCode = await runSnapshotBootstrap(config.snapshot, new SnapshotHolder(), { logger });
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Snapshot bootstrap failed.");
    process.exitCode = 1;
});
