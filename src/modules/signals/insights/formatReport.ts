/**
 * Plain-text report for a series analysis
 */

import type { Insight, InsightTone, SeriesAnalysis } from '../types';
import { describeSignals, DISCLAIMER, INDICATOR_NOTES } from './describeSignals';

const TONE_ICONS: Record<InsightTone, string> = {
  success: '✅',
  warning: '⚠️ ',
  info: 'ℹ️ ',
};

export function formatIndicatorValue(value: number | undefined): string {
  return value === undefined ? 'n/a' : value.toFixed(2);
}

export function formatInsight(insight: Insight): string {
  return `${TONE_ICONS[insight.tone]} ${insight.message}`;
}

/**
 * Report lines: latest values, insights, indicator notes, disclaimer
 */
export function formatReport(analysis: SeriesAnalysis): string[] {
  const { params, latest, rows } = analysis;
  const lastRow = rows[rows.length - 1];
  const asOf = lastRow === undefined ? 'n/a' : lastRow.date;
  const insights = describeSignals(analysis.signals, params);

  return [
    `Latest values (as of ${asOf}, ${rows.length} bars):`,
    `  Close: ${formatIndicatorValue(latest.close)}`,
    `  SMA${params.smaShortWindow}: ${formatIndicatorValue(latest.smaShort)}`,
    `  SMA${params.smaLongWindow}: ${formatIndicatorValue(latest.smaLong)}`,
    `  RSI${params.rsiWindow}: ${formatIndicatorValue(latest.rsi)}`,
    `  Bollinger upper: ${formatIndicatorValue(latest.bbUpper)}`,
    `  Bollinger lower: ${formatIndicatorValue(latest.bbLower)}`,
    `  Volatility: ${formatIndicatorValue(latest.volatility)}`,
    '',
    'Key insights:',
    ...insights.map((insight) => `  ${formatInsight(insight)}`),
    '',
    'Notes:',
    ...insights.map(({ topic }) => {
      const { title, note } = INDICATOR_NOTES[topic];
      return `  ${TONE_ICONS.info} ${title}: ${note}`;
    }),
    '',
    DISCLAIMER,
  ];
}
