export {
  parseCell,
  parseRecord,
  display,
  exportValue,
  isRich,
  isTextLike,
  scalar,
  rich,
  toWireCell,
  toWireRecord,
} from './cell-normalizer';
export { PaginatedAggregator, isPartial, MAX_PER_PAGE } from './aggregator';
export type { AggregatorOptions, FetchAllOptions, PageProgress } from './aggregator';
export { DatasetStore, buildSummary, formatSummary, datasetFileName, SUMMARY_FILE } from './dataset-store';
export type { SaveOutcome } from './dataset-store';
