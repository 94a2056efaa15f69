#!/usr/bin/env node
/**
 * PWS failover service
 * Entry point
 */

import { config, toAcquisitionConfig } from './config.js';
import { logger } from './logger.js';
import { FIELD_CONDITION_TEMP } from './weather/fields.js';
import { PwsCoordinator } from './weather/index.js';
import { NotReadyError } from './weather/errors.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
        error: error.message,
        stack: error.stack,
    });
    process.exit(1);
});

function logSummary(coordinator: PwsCoordinator): void {
    const temp = coordinator.getCondition(FIELD_CONDITION_TEMP);
    logger.info(`[${coordinator.config.groupName}] ${coordinator.attribution()}`, {
        temperature: temp !== undefined ? `${temp}${coordinator.units().temperature}` : null,
        condition: coordinator.currentCondition() ?? null,
        health: coordinator.health(),
    });
}

async function main(): Promise<void> {
    const coordinator = new PwsCoordinator(toAcquisitionConfig(config));

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        coordinator.dispose();
        process.exit(0);
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    try {
        await coordinator.firstRefresh();
    } catch (error) {
        if (error instanceof NotReadyError) {
            logger.error('Not ready: no station delivered data on the first refresh', { error: error.message });
            coordinator.dispose();
            process.exit(1);
        }
        throw error;
    }

    coordinator.on('refreshed', () => logSummary(coordinator));
    coordinator.on('refreshFailed', () => {
        logger.warn(`[${coordinator.config.groupName}] Refresh failed, serving stale data`, {
            activeSource: coordinator.activeSourceId(),
        });
    });
    coordinator.on('sourceStatusChanged', (id, from, to) => {
        logger.info(`Station ${id}: ${from} -> ${to}`);
    });

    logSummary(coordinator);
    coordinator.start();
}

main().catch(error => {
    logger.error('Fatal error', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
