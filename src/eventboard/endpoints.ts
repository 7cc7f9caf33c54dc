import { DatasetTarget } from './types';

export interface SourceDefinition {
  family: string;
  label: string;
  endpoint: string;
  markets?: readonly string[];
}

export const DATASET_SOURCES: readonly SourceDefinition[] = [
  { family: 'event_calendar', label: 'Event Calendar', endpoint: '/event-calendar' },
  { family: 'announcements', label: 'Announcements', endpoint: '/announcements', markets: ['equity', 'sme', 'debt', 'mf'] },
  { family: 'crd', label: 'CRD Credit Rating', endpoint: '/crd' },
  { family: 'credit_rating', label: 'Credit Rating Reg.30', endpoint: '/credit-rating', markets: ['equity', 'sme'] },
];

/**
 * One target per endpoint, or per endpoint/market pair where the endpoint
 * is partitioned by market.
 */
export function expandTargets(sources: readonly SourceDefinition[] = DATASET_SOURCES): DatasetTarget[] {
  return sources.flatMap((source): DatasetTarget[] => {
    if (!source.markets || source.markets.length === 0) {
      return [{ name: source.family, family: source.family, label: source.label, endpoint: source.endpoint, params: {} }];
    }
    return source.markets.map((market) => ({
      name: `${source.family}_${market}`,
      family: source.family,
      label: `${source.label} (${market.toUpperCase()})`,
      endpoint: source.endpoint,
      params: { market },
    }));
  });
}
