import { PriceMonitor } from '../monitor/price_monitor.js';
import { formatChangeEvent, formatPrice } from '../monitor/format.js';

async function main() {
    const monitor = new PriceMonitor();

    console.log('🔍 Checking for price updates...');
    console.log(`URL: ${monitor.poller.url}`);
    console.log('');

    // 1. One check
    const event = await monitor.checkForUpdates();
    if (event) {
        console.log(`✅ ${event.kind === 'initial' ? 'Initial price' : 'Price change'} detected:`);
        console.log(`   ${formatChangeEvent(event)}`);
    } else {
        const lastCheck = monitor.lastCheck();
        if (lastCheck?.outcome === 'failed') {
            console.log(`❌ Check failed: ${lastCheck.error ?? 'unknown error'}`);
        } else {
            console.log('✅ No significant price changes detected');
        }
    }

    // 2. Current price
    console.log('\n💰 Current price');
    const current = monitor.currentPrice();
    if (current) {
        console.log(`   ${formatPrice(current.price)} (Cycle: ${current.cycle})`);
        if (current.observedAt) {
            console.log(`   Observed: ${current.observedAt}`);
        }
    } else {
        console.log('   None available');
    }

    // 3. Status
    const status = monitor.status();
    console.log('\n📊 Monitoring status');
    console.log(`   History entries: ${status.historyCount}`);
    console.log(`   Change threshold: ${formatPrice(status.changeThreshold)}`);
    console.log(`   Poll interval: ${status.poll.currentIntervalSeconds}s (base ${status.poll.baseIntervalSeconds}s, relaxed ${status.poll.relaxedIntervalSeconds}s)`);
    console.log(`   Next poll: ${new Date(status.poll.nextPollTime).toISOString()}`);

    // 4. Summary
    const summary = monitor.summary();
    console.log('\n📈 Recent statistics');
    if (summary) {
        console.log(`   Average: ${formatPrice(summary.avgPrice)} over ${summary.windowSize} entries`);
        console.log(`   Range: ${formatPrice(summary.minPrice)} - ${formatPrice(summary.maxPrice)}`);
        console.log(`   Cycles: ${summary.minCycle} - ${summary.maxCycle}`);
    } else {
        console.log('   No price history available');
    }
    console.log('');
}

main().catch((error) => {
    console.error('❌ Check failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
});
