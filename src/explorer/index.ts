export {
  RecordView,
  filter,
  filterAny,
  frequency,
  topN,
  distinctCount,
  countArtifacts,
  columnsOf,
  render,
  toCsv,
  exportCsv,
  formatFrequency,
  formatMetadata,
  UNKNOWN_VALUE,
} from './record-view';
export type { RenderOptions, FrequencyEntry } from './record-view';
export { FIELD_MAPPINGS, GENERIC_MAPPING, resolveFieldMapping } from './field-mappings';
export type { FieldMapping, SearchDefinition, StatisticDefinition, ArtifactCounter, PresetFilter } from './field-mappings';
export { InteractiveExplorer, exploreStore, selectDataset, exportFileName, formatFileChoices } from './interactive-menu';
export type { Prompt, Writer, ExplorerIO, ExplorerOptions, MenuOutcome, MenuItem } from './interactive-menu';
