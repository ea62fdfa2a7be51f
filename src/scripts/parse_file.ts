import { readFileSync } from 'fs';
import { config as loadEnv } from 'dotenv';
import { ParseError, historyFromPayload, isValidPricePoint, parseLatest, statisticsFromPayload } from '../data/price/price_parser.js';
import { formatPrice } from '../monitor/format.js';
import { parsePositiveInt } from './args.js';

// Load environment variables
loadEnv();

const filePath = process.argv[2] ?? process.env.PRICE_FILE;
const limit = parsePositiveInt(process.env.PRICE_HISTORY_LIMIT, 5);

if (!filePath) {
    console.error('❌ Error: a payload file is required');
    console.error('');
    console.error('Usage:');
    console.error('  npm run parse -- ./oil-prices.json');
    console.error('  PRICE_FILE=./oil-prices.json npm run parse');
    console.error('');
    process.exit(1);
}

function main(path: string) {
    console.log(`📁 Parsing ${path}`);
    console.log('');

    const payload = readFileSync(path, 'utf-8');

    try {
        const latest = parseLatest(payload);
        console.log(`✅ Latest price: ${formatPrice(latest.price)} (Cycle: ${latest.cycle})`);
        console.log(`   Valid: ${isValidPricePoint(latest) ? 'PASS' : 'FAIL'}`);

        const stats = statisticsFromPayload(payload);
        console.log('\n📊 Statistics');
        console.log(`   Entries: ${stats.totalEntries}`);
        console.log(`   Min: ${formatPrice(stats.minPrice)}`);
        console.log(`   Max: ${formatPrice(stats.maxPrice)}`);
        console.log(`   Avg: ${formatPrice(stats.avgPrice)}`);
        console.log(`   Cycles: ${stats.minCycle} - ${stats.maxCycle}`);

        console.log(`\n📈 Recent history (last ${limit})`);
        for (const point of historyFromPayload(payload, limit)) {
            console.log(`   Cycle ${point.cycle}: ${formatPrice(point.price)}`);
        }
        console.log('');
    } catch (error) {
        if (error instanceof ParseError) {
            console.error(`❌ Could not parse payload: ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

main(filePath);
