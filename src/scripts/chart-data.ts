#!/usr/bin/env node

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from '../config/env';
import { parseLookback, parseResolution } from '../core/charts/resolution';
import { ChartDataService } from '../core/services/chart-data-service';
import { HttpDataSourceGateway } from '../core/services/http-data-source-gateway';
import { createLogger } from '../core/utils/logger';
import { LOOKBACK_LABELS, RESOLUTION_LABELS } from '../types/charts';

dotenv.config();

const logger = createLogger('ChartDataScript');

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('chart-data')
    .usage('$0 --address <0x...> [--resolution 1h] [--lookback 1w]')
    .option('address', {
      alias: 'a',
      description: 'Subject address',
      type: 'string',
      demandOption: true,
    })
    .option('resolution', {
      alias: 'r',
      description: 'Candle resolution',
      choices: RESOLUTION_LABELS,
      default: '1h',
    })
    .option('lookback', {
      alias: 'l',
      description: 'How far back the series reaches',
      choices: LOOKBACK_LABELS,
      default: '1w',
    })
    .option('price', { type: 'boolean', default: true, description: 'Include the pool price series' })
    .option('lending', { type: 'boolean', default: true, description: 'Include lending volume candles' })
    .option('operations', { type: 'boolean', default: true, description: 'Include operation markers' })
    .option('output', {
      alias: 'o',
      description: 'Directory for the JSON output',
      type: 'string',
      default: 'reports',
    })
    .help()
    .alias('help', 'h')
    .parse();

  const resolution = parseResolution(String(argv.resolution));
  const lookback = parseLookback(String(argv.lookback));

  const config = loadConfig();
  const service = new ChartDataService(new HttpDataSourceGateway(config), config);
  const chart = await service.getChartData(argv.address, resolution, lookback, {
    includePrice: argv.price,
    includeLending: argv.lending,
    includeOperations: argv.operations,
  });

  fs.mkdirSync(argv.output, { recursive: true });
  const outputPath = path.join(
    argv.output,
    `chart_${argv.address.toLowerCase()}_${resolution}_${lookback}_${chart.generatedAt}.json`,
  );
  fs.writeFileSync(outputPath, JSON.stringify(chart, null, 2));

  logger.info(
    `Wrote ${chart.balance.length} balance, ${chart.price?.length ?? 0} price, ${chart.lending?.length ?? 0} lending candles and ${chart.operations?.count ?? 0} markers to ${outputPath}`,
  );
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Chart data generation failed', error);
    process.exit(1);
  });
}
