/**
 * Analyze series script
 * 
 * Reads a local daily bar file, computes indicators and prints the latest
 * values, the signal insights and the disclaimer.
 * 
 * Usage: npm run analyze -- <bars.csv|bars.json>
 * 
 * Env vars (see .env.example):
 * - SIGNALS_SMA_SHORT_WINDOW / SIGNALS_SMA_LONG_WINDOW (default 50 / 200)
 * - SIGNALS_RSI_WINDOW (default 14)
 * - SIGNALS_BOLLINGER_WINDOW / SIGNALS_BOLLINGER_K (default 20 / 2)
 * - SIGNALS_VOLATILITY_WINDOW (default 20)
 */

import './load-env';

import { resolve } from 'node:path';
import {
  analyzeSeries,
  formatReport,
  getAnalysisParamsFromEnv,
  isSignalsError,
  loadBarsFile,
} from '../src/modules/signals';

function main(): void {
  const fileArg = process.argv[2];
  if (!fileArg) {
    console.error('Usage: npm run analyze -- <bars.csv|bars.json>');
    process.exitCode = 1;
    return;
  }

  const path = resolve(process.cwd(), fileArg);
  const params = getAnalysisParamsFromEnv();

  console.log(`📈 Analyzing ${path}`);
  const bars = loadBarsFile(path);
  console.log(`  Loaded ${bars.length} bars (${bars[0]?.date} → ${bars[bars.length - 1]?.date})\n`);

  const analysis = analyzeSeries(bars, params);
  for (const line of formatReport(analysis)) {
    console.log(line);
  }

  console.log('\n✅ Analysis complete');
}

try {
  main();
} catch (error) {
  if (isSignalsError(error)) {
    console.error(`❌ ${error.code}: ${error.message}`);
  } else {
    console.error('❌ Fatal error:', error);
  }
  process.exitCode = 1;
}
