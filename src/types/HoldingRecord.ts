export interface HoldingDetails {
  identityKey: string; // ISIN in the monthly portfolio disclosures
  name: string;
  category: string; // industry / sector as printed in the source sheet
}

export interface HoldingRecord extends HoldingDetails {
  quantity: number;
  marketValue: number; // in lakhs
  percentOfNav: number;
}

export type MetricName = 'quantity' | 'marketValue' | 'percentOfNav';

export const METRIC_NAMES: readonly MetricName[] = ['quantity', 'marketValue', 'percentOfNav'];
