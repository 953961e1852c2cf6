import type { ChangeReport, ChangeResult, MetricName, PeriodLabel } from '../types';
import { METRIC_NAMES } from '../types';

const METRIC_LABELS: Record<MetricName, string> = {
  quantity: 'Quantity',
  marketValue: 'Market Value (Lakhs)',
  percentOfNav: '% to NAV',
};

const STATUS_LABELS: Record<ChangeResult['status'], string> = {
  'existing': 'Existing',
  'new-addition': 'New Addition',
};

const numberFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatNumber(value: number): string {
  return numberFormat.format(value);
}

export function formatPercentChange(value: number | null): string {
  if (value === null) return 'N/A (starting value was 0)';
  return `${value < 0 ? '-' : '+'}${formatNumber(Math.abs(value))}%`;
}

function formatResult(result: ChangeResult): string[] {
  const lines = [
    '',
    `Fund Name: ${result.identity.name}`,
    `ISIN: ${result.identity.identityKey}`,
    `Industry: ${result.identity.category}`,
    `Status: ${STATUS_LABELS[result.status]}`,
  ];

  if (result.status === 'new-addition') {
    lines.push('This is a new fund addition - no change calculations available');
    lines.push('-'.repeat(40));
    return lines;
  }

  lines.push('', 'Changes:');
  for (const metric of METRIC_NAMES) {
    const change = result.changes[metric];
    if (!change) continue;
    lines.push(
      `${METRIC_LABELS[metric]}:`,
      `  Start: ${formatNumber(change.startValue)}`,
      `  End: ${formatNumber(change.endValue)}`,
      `  Change: ${formatPercentChange(change.percentChange)}`
    );
  }
  lines.push('-'.repeat(40));
  return lines;
}

export function formatChangeReport(report: ChangeReport): string {
  const lines = [`Analysis Results (${report.startPeriod} to ${report.endPeriod}):`, '='.repeat(80)];

  if (report.results.length === 0) {
    lines.push(`No holdings matched "${report.query}" in ${report.endPeriod}`);
  }
  for (const result of report.results) {
    lines.push(...formatResult(result));
  }
  return lines.join('\n');
}

export function formatPeriodList(periods: PeriodLabel[]): string {
  return ['Available months:', ...periods.map(p => `- ${p}`)].join('\n');
}
