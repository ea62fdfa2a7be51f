import { env } from './config/env.js';
import { logger, errorMessage } from './infra/logger.js';
import { PriceMonitor } from './monitor/price_monitor.js';
import { MonitorScheduler } from './monitor/scheduler.js';
import { formatChangeEvent } from './monitor/format.js';

// Owned here and handed to the shutdown handler
let monitor: PriceMonitor | null = null;
let scheduler: MonitorScheduler | null = null;

/**
 * Main application entry point
 */
async function main() {
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
    });

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`💾 Log to File: ${env.LOG_TO_FILE ? 'Enabled' : 'Disabled'}`);
    console.log(`\n🛢️  Price Source:`);
    console.log(`  🔗 URL: ${env.PRICE_URL}`);
    console.log(`  ⏱️  Base Interval: ${env.POLLING_INTERVAL_S}s`);
    console.log(`  😴 Relaxed Interval: ${env.POLLING_INTERVAL_S * env.RELAX_MULTIPLIER}s after ${env.NO_CHANGE_LIMIT} quiet polls`);
    console.log(`  ⌛ Request Timeout: ${env.REQUEST_TIMEOUT_MS}ms`);
    console.log(`\n🎯 Change Detection:`);
    console.log(`  💰 Threshold: $${env.CHANGE_THRESHOLD.toFixed(2)}`);
    console.log(`  📁 History File: ${env.HISTORY_FILE}\n`);

    monitor = new PriceMonitor();

    scheduler = new MonitorScheduler(monitor, {
        onEvent: (event) => {
            logger.info('price.change', {
                kind: event.kind,
                summary: formatChangeEvent(event),
                newPrice: event.newPrice,
                newCycle: event.newCycle,
                delta: event.delta,
                deltaPercent: event.deltaPercent,
            });
        },
    });
    scheduler.start();

    logger.info('app.ready', {
        message: 'Application initialized successfully',
        currentPrice: monitor.currentPrice(),
        historyEntries: monitor.history.size(),
    });
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string) {
    logger.info('app.shutdown', {
        message: `Received ${signal}, shutting down gracefully...`,
        lastCheck: monitor?.lastCheck() ?? null,
    });

    if (scheduler) {
        scheduler.stop();
    }

    setTimeout(() => {
        process.exit(0);
    }, 1000);
}

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

main().catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
