import { describe, it, expect, vi } from 'vitest';
import { HealthProbe, countReadyMonitors, formatReadiness } from '../src/eventboard/health-probe';
import { ReadinessReport } from '../src/types';
import { ProbeUnavailableError } from '../src/utils/errors';

const ready: ReadinessReport = {
  status: 'healthy',
  ready: true,
  monitors: { equity: true, sme: false },
  timestamp: '2025-03-01T10:00:00Z',
};

const starting: ReadinessReport = {
  status: 'starting',
  ready: false,
  monitors: { equity: false, sme: false },
};

describe('HealthProbe', () => {
  describe('check', () => {
    it('should return the readiness report', async () => {
      const probe = new HealthProbe(async () => ready);

      await expect(probe.check()).resolves.toEqual(ready);
    });

    it('should wrap unexpected failures as unavailable', async () => {
      const probe = new HealthProbe(async () => {
        throw new Error('socket hang up');
      });

      await expect(probe.check()).rejects.toThrow(new ProbeUnavailableError('socket hang up'));
    });
  });

  describe('gate', () => {
    it('should proceed when at least one monitor is ready', async () => {
      const probe = new HealthProbe(async () => ready);

      const outcome = await probe.gate();

      expect(outcome.decision).toEqual({ proceed: true, reason: 'ready' });
      expect(outcome.report).toEqual(ready);
    });

    it('should refuse when no monitor is ready', async () => {
      const probe = new HealthProbe(async () => starting);

      const { decision } = await probe.gate();

      expect(decision).toEqual({
        proceed: false,
        reason: 'no-ready-monitors',
        message: 'No monitors are ready; the source may have just started',
      });
    });

    it('should proceed on override when no monitor is ready', async () => {
      const probe = new HealthProbe(async () => starting, { proceedWithoutReadyMonitors: true });

      const { decision } = await probe.gate();

      expect(decision).toEqual({ proceed: true, reason: 'override' });
    });

    it('should ask the decision callback instead of the flag', async () => {
      const decide = vi.fn().mockResolvedValue(true);
      const probe = new HealthProbe(async () => starting, { proceedWithoutReadyMonitors: false, decide });

      const { decision } = await probe.gate();

      expect(decide).toHaveBeenCalledWith(starting);
      expect(decision).toEqual({ proceed: true, reason: 'override' });
    });

    it('should not ask when a monitor is ready', async () => {
      const decide = vi.fn().mockResolvedValue(false);
      const probe = new HealthProbe(async () => ready, { decide });

      await probe.gate();

      expect(decide).not.toHaveBeenCalled();
    });

    it('should refuse when the health endpoint is unavailable', async () => {
      const probe = new HealthProbe(async () => {
        throw new ProbeUnavailableError('Network error: connect ECONNREFUSED');
      });

      const outcome = await probe.gate();

      expect(outcome.decision).toEqual({
        proceed: false,
        reason: 'probe-unavailable',
        message: 'Health endpoint unavailable: Network error: connect ECONNREFUSED',
      });
      expect(outcome.report).toBeUndefined();
    });

    it('should proceed when unavailable only if told to', async () => {
      const probe = new HealthProbe(
        async () => {
          throw new Error('down');
        },
        { proceedWhenUnavailable: true }
      );

      const { decision } = await probe.gate();

      expect(decision).toEqual({ proceed: true, reason: 'override' });
    });
  });
});

describe('countReadyMonitors', () => {
  it('should count monitors reporting ready', () => {
    expect(countReadyMonitors(ready)).toBe(1);
    expect(countReadyMonitors(starting)).toBe(0);
    expect(countReadyMonitors({ status: 'ok', ready: false, monitors: {} })).toBe(0);
  });
});

describe('formatReadiness', () => {
  it('should list every monitor with its state', () => {
    expect(formatReadiness(ready)).toBe(
      [
        'Status: healthy',
        'Ready: true',
        'Timestamp: 2025-03-01T10:00:00Z',
        '',
        'Monitors:',
        '  [x] equity',
        '  [ ] sme',
      ].join('\n')
    );
  });

  it('should note when no monitors are reported', () => {
    expect(formatReadiness({ status: 'starting', ready: false, monitors: {} })).toBe(
      ['Status: starting', 'Ready: false', '', 'Monitors:', '  (none reported)'].join('\n')
    );
  });
});
