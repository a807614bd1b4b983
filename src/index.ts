#!/usr/bin/env node
import { loadConfigFromEnvironment, type AppConfig } from "./config";
import { EXIT_INVALID_CONFIG, runOnce } from "./jobs/runCoordinator";
import { AppError, ErrorCode } from "./utils/errors";
import { logger } from "./utils/logger";

function loadConfigOrExit(): AppConfig | null {
    try {
        return loadConfigFromEnvironment();
    } catch (error) {
        if (error instanceof AppError && error.code === ErrorCode.INVALID_CONFIG) {
            logger.error(error.message);
            return null;
        }
        throw error;
    }
}

async function main(): Promise<number> {
    const config = loadConfigOrExit();
    if (!config) {
        return EXIT_INVALID_CONFIG;
    }

    logger.info(
        `Reconciling ${config.services.map((service) => service.origin).join(", ")}`
    );
    const report = await runOnce(config);
    return report.exitCode;
}

main()
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
        logger.error("Run aborted", { error });
        process.exitCode = 1;
    });
