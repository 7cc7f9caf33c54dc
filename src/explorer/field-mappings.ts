export interface SearchDefinition {
  label: string;
  prompt: string;
  /** A record matches when any of these fields matches */
  fields: string[];
}

export interface StatisticDefinition {
  title: string;
  field: string;
  /** Entries shown; omitted means all */
  top?: number;
}

export interface ArtifactCounter {
  label: string;
  field: string;
  kind: string;
}

export interface PresetFilter {
  label: string;
  field: string;
  keyword: string;
}

export interface FieldMapping {
  family: string;
  /** Plural noun used in menu text, e.g. "announcements" */
  noun: string;
  entityField?: string;
  summaryFields: string[];
  searches: SearchDefinition[];
  statistics: StatisticDefinition[];
  artifacts: ArtifactCounter[];
  presets: PresetFilter[];
}

export const FIELD_MAPPINGS: readonly FieldMapping[] = [
  {
    family: 'event_calendar',
    noun: 'events',
    entityField: 'COMPANY',
    summaryFields: ['SYMBOL', 'COMPANY', 'PURPOSE', 'DATE'],
    searches: [
      { label: 'Search by Purpose', prompt: 'Enter purpose keyword (e.g. dividend, results)', fields: ['PURPOSE'] },
      { label: 'Search by Company', prompt: 'Enter company name', fields: ['COMPANY', 'SYMBOL'] },
      { label: 'Search by Date', prompt: 'Enter date (e.g. 12-Dec-2025)', fields: ['DATE'] },
    ],
    statistics: [
      { title: 'Top Event Purposes', field: 'PURPOSE', top: 10 },
      { title: 'Events by Date (Top 10)', field: 'DATE', top: 10 },
    ],
    artifacts: [],
    presets: [],
  },
  {
    family: 'announcements',
    noun: 'announcements',
    entityField: 'COMPANY NAME',
    summaryFields: ['SYMBOL', 'COMPANY NAME', 'SUBJECT', 'BROADCAST DATE/TIME'],
    searches: [
      { label: 'Search by Subject', prompt: 'Enter subject keyword (e.g. dividend, result, merger)', fields: ['SUBJECT'] },
      { label: 'Search by Company/Symbol', prompt: 'Enter company name or symbol', fields: ['COMPANY NAME', 'SYMBOL'] },
      { label: 'Search by Date', prompt: 'Enter date (e.g. 12-Dec-2025)', fields: ['BROADCAST DATE/TIME'] },
    ],
    statistics: [{ title: 'Top Announcement Subjects', field: 'SUBJECT', top: 15 }],
    artifacts: [
      { label: 'With PDF', field: 'ATTACHMENT', kind: 'pdf' },
      { label: 'With XBRL', field: 'XBRL', kind: 'xbrl' },
    ],
    presets: [
      { label: 'Filter by Financial Results', field: 'SUBJECT', keyword: 'result' },
      { label: 'Filter by Dividend', field: 'SUBJECT', keyword: 'dividend' },
    ],
  },
  {
    family: 'crd',
    noun: 'records',
    entityField: 'COMPANY NAME',
    summaryFields: ['COMPANY NAME', 'CREDIT RATING', 'NAME OF CREDIT RATING AGENCY'],
    searches: [
      { label: 'Search by Company Name', prompt: 'Enter company name', fields: ['COMPANY NAME'] },
      { label: 'Search by Rating Agency', prompt: 'Enter rating agency', fields: ['NAME OF CREDIT RATING AGENCY'] },
      { label: 'Search by Credit Rating', prompt: 'Enter credit rating (e.g. AAA)', fields: ['CREDIT RATING'] },
    ],
    statistics: [
      { title: 'Top Rating Agencies', field: 'NAME OF CREDIT RATING AGENCY', top: 10 },
      { title: 'Top Credit Ratings', field: 'CREDIT RATING', top: 10 },
      { title: 'Rating Actions', field: 'RATING ACTION' },
    ],
    artifacts: [],
    presets: [],
  },
  {
    family: 'credit_rating',
    noun: 'records',
    entityField: 'COMPANY NAME',
    summaryFields: ['SYMBOL', 'COMPANY NAME', 'CREDIT RATING', 'CURRENT ACTION'],
    searches: [
      { label: 'Search by Company/Symbol', prompt: 'Enter company name or symbol', fields: ['COMPANY NAME', 'SYMBOL'] },
      { label: 'Search by Credit Rating', prompt: 'Enter credit rating (e.g. AAA)', fields: ['CREDIT RATING'] },
      { label: 'Search by Action', prompt: 'Enter action (e.g. Reaffirm, Upgrade)', fields: ['CURRENT ACTION'] },
    ],
    statistics: [
      { title: 'Top Credit Ratings', field: 'CREDIT RATING', top: 15 },
      { title: 'Current Actions', field: 'CURRENT ACTION', top: 10 },
      { title: 'Rating Types', field: 'CREDIT TYPE' },
    ],
    artifacts: [],
    presets: [],
  },
];

export const GENERIC_MAPPING: FieldMapping = {
  family: 'generic',
  noun: 'records',
  summaryFields: [],
  searches: [],
  statistics: [],
  artifacts: [],
  presets: [],
};

/**
 * Dataset names are either a family (`crd`) or a family with a market
 * suffix (`announcements_equity`). Longest family wins so `credit_rating_sme`
 * never resolves to a shorter prefix.
 */
export function resolveFieldMapping(datasetName: string): FieldMapping {
  const name = datasetName.toLowerCase();
  const candidates = FIELD_MAPPINGS.filter(
    (mapping) => name === mapping.family || name.startsWith(`${mapping.family}_`)
  ).sort((a, b) => b.family.length - a.family.length);
  return candidates[0] ?? GENERIC_MAPPING;
}
