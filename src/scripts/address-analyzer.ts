#!/usr/bin/env node

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from '../config/env';
import { AddressAnalysisService } from '../core/services/address-analysis-service';
import { HttpDataSourceGateway } from '../core/services/http-data-source-gateway';
import { createLogger } from '../core/utils/logger';
import { AddressAnalysis } from '../types/analysis';

dotenv.config();

const logger = createLogger('AddressAnalyzerScript');

function printSummary(analysis: AddressAnalysis, symbol: string): void {
  const { swapStats, lending, balanceHistory, behavior } = analysis;
  console.log('\n' + '='.repeat(60));
  console.log(`ADDRESS ANALYSIS: ${analysis.address}`);
  console.log('='.repeat(60));
  console.log(`  Balance:   ${analysis.currentBalance.toFixed(2)} ${symbol}`);
  console.log(
    `  Transfers: ${analysis.transferSummary.totalTransfers} (${analysis.transferSummary.referenceTransfers} ${symbol}, ${analysis.transferSummary.otherTokenTransfers} other)`,
  );
  console.log(
    `  Swaps:     ${swapStats.totalSwaps} (buy ${swapStats.buyCount}, sell ${swapStats.sellCount}, router ${swapStats.routerInteractionCount})`,
  );
  console.log(`  Routers:   ${swapStats.routersUsed.length > 0 ? swapStats.routersUsed.join(', ') : 'None'}`);
  console.log(`  Lending:   ${lending.stats.lendTxCount} lend, ${lending.stats.borrowTxCount} borrow`);
  console.log(
    `  Holding:   ${balanceHistory.totalHoldingDays.toFixed(1)} days total, ${balanceHistory.currentHoldingDays.toFixed(1)} days current`,
  );
  console.log(`  Tags:      ${behavior.tags.join(', ')}`);
  console.log(`  Complete:  ${analysis.dataComplete}`);
  for (const warning of analysis.warnings) {
    console.log(`  Warning:   ${warning}`);
  }
}

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('address-analyzer')
    .usage('$0 --address <0x...> [--output <dir>]')
    .option('address', {
      alias: 'a',
      description: 'Subject address to analyze',
      type: 'string',
      demandOption: true,
    })
    .option('output', {
      alias: 'o',
      description: 'Directory for the JSON report',
      type: 'string',
      default: 'reports',
    })
    .check((args) => {
      if (!/^0x[a-fA-F0-9]{40}$/.test(args.address)) {
        throw new Error(`Invalid address: ${args.address}`);
      }
      return true;
    })
    .help()
    .alias('help', 'h')
    .parse();

  const config = loadConfig();
  const service = new AddressAnalysisService(new HttpDataSourceGateway(config), config);
  const analysis = await service.analyzeAddress(argv.address);

  fs.mkdirSync(argv.output, { recursive: true });
  const outputPath = path.join(argv.output, `address_analysis_${argv.address.toLowerCase()}_${analysis.generatedAt}.json`);
  fs.writeFileSync(outputPath, JSON.stringify(analysis, null, 2));

  printSummary(analysis, config.referenceToken.symbol);
  logger.info(`Report written to ${outputPath}`);
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Address analysis failed', error);
    process.exit(1);
  });
}
