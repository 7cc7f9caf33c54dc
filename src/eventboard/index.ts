export { EventBoardClient } from './rest-client';
export type { EventBoardClientOptions } from './rest-client';
export { HealthProbe, formatReadiness, countReadyMonitors } from './health-probe';
export type { HealthProbeOptions, ProceedDecision, ReadinessSource, GateOutcome } from './health-probe';
export { DATASET_SOURCES, expandTargets } from './endpoints';
export type { SourceDefinition } from './endpoints';
export type { PageSource, PageResult, PageFetchError, DatasetTarget } from './types';
