import { GateDecision, ReadinessReport } from '../types';
import { logger, errorMessage, ProbeUnavailableError } from '../utils';

export type ReadinessSource = () => Promise<ReadinessReport>;

/**
 * Called when the source is reachable but no monitor reports ready.
 * Returning true lets the bulk fetch go ahead anyway.
 */
export type ProceedDecision = (report: ReadinessReport) => boolean | Promise<boolean>;

export interface HealthProbeOptions {
  proceedWithoutReadyMonitors?: boolean;
  proceedWhenUnavailable?: boolean;
  decide?: ProceedDecision;
}

export interface GateOutcome {
  decision: GateDecision;
  report?: ReadinessReport;
}

export function countReadyMonitors(report: ReadinessReport): number {
  return Object.values(report.monitors).filter(Boolean).length;
}

export class HealthProbe {
  private source: ReadinessSource;
  private options: HealthProbeOptions;

  constructor(source: ReadinessSource, options: HealthProbeOptions = {}) {
    this.source = source;
    this.options = options;
  }

  async check(): Promise<ReadinessReport> {
    const start = Date.now();
    try {
      const report = await this.source();
      logger.info('HealthProbe', 'Readiness received', {
        status: report.status,
        ready: report.ready,
        monitorsReady: countReadyMonitors(report),
        monitorsTotal: Object.keys(report.monitors).length,
        latencyMs: Date.now() - start,
      });
      return report;
    } catch (error) {
      if (error instanceof ProbeUnavailableError) {
        throw error;
      }
      throw new ProbeUnavailableError(errorMessage(error));
    }
  }

  async gate(): Promise<GateOutcome> {
    let report: ReadinessReport;
    try {
      report = await this.check();
    } catch (error) {
      const message = errorMessage(error);
      logger.error('HealthProbe', 'Health check failed', { error: message });
      if (this.options.proceedWhenUnavailable) {
        return { decision: { proceed: true, reason: 'override' } };
      }
      return { decision: { proceed: false, reason: 'probe-unavailable', message } };
    }

    if (countReadyMonitors(report) > 0) {
      return { decision: { proceed: true, reason: 'ready' }, report };
    }

    logger.warn('HealthProbe', 'No monitors are ready yet', { monitors: report.monitors });

    const proceed = this.options.decide
      ? await this.options.decide(report)
      : this.options.proceedWithoutReadyMonitors === true;

    if (proceed) {
      return { decision: { proceed: true, reason: 'override' }, report };
    }
    return {
      decision: {
        proceed: false,
        reason: 'no-ready-monitors',
        message: 'No monitors are ready; the source may have just started',
      },
      report,
    };
  }
}

export function formatReadiness(report: ReadinessReport): string {
  const lines = [
    `Status: ${report.status}`,
    `Ready: ${report.ready}`,
    ...(report.timestamp ? [`Timestamp: ${report.timestamp}`] : []),
    '',
    'Monitors:',
  ];
  const entries = Object.entries(report.monitors);
  if (entries.length === 0) {
    lines.push('  (none reported)');
  }
  for (const [name, ready] of entries) {
    lines.push(`  [${ready ? 'x' : ' '}] ${name}`);
  }
  return lines.join('\n');
}
