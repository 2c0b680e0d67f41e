import { describe, it, expect } from 'vitest';
import {
  composeNotification,
  decideNotification,
  formatDelta,
  type NotificationPolicy,
} from '../../../src/alerts/notify.js';

const basePolicy: NotificationPolicy = {
  testMode: false,
  minChangeThreshold: 1,
  quietMode: true,
  notifyNoChange: false,
  notifyStartup: false,
};

function policy(overrides: Partial<NotificationPolicy> = {}): NotificationPolicy {
  return { ...basePolicy, ...overrides };
}

describe('decideNotification', () => {
  it('never notifies when the fetch failed, even in test mode', () => {
    expect(decideNotification({ previous: 120, observed: null, policy: policy({ testMode: true }) })).toEqual({
      notify: false,
      reason: 'fetch_failed',
    });
  });

  it('always notifies in test mode', () => {
    expect(decideNotification({ previous: 120, observed: 120, policy: policy({ testMode: true }) })).toEqual({
      notify: true,
      reason: 'test',
    });
    expect(decideNotification({ previous: null, observed: 120, policy: policy({ testMode: true }) })).toEqual({
      notify: true,
      reason: 'test',
    });
  });

  it('stays silent on the first run unless startup notifications are on', () => {
    expect(decideNotification({ previous: null, observed: 120, policy: policy() })).toEqual({
      notify: false,
      reason: 'startup_disabled',
    });
    expect(decideNotification({ previous: null, observed: 120, policy: policy({ notifyStartup: true }) })).toEqual({
      notify: true,
      reason: 'startup',
    });
  });

  it('notifies when the change reaches the threshold', () => {
    expect(decideNotification({ previous: 120, observed: 121, policy: policy() })).toEqual({
      notify: true,
      reason: 'significant_change',
    });
    expect(decideNotification({ previous: 120, observed: 117, policy: policy({ minChangeThreshold: 3 }) })).toEqual({
      notify: true,
      reason: 'significant_change',
    });
  });

  it('ignores changes below the threshold in quiet mode', () => {
    expect(decideNotification({ previous: 120, observed: 122, policy: policy({ minChangeThreshold: 3 }) })).toEqual({
      notify: false,
      reason: 'below_threshold',
    });
  });

  it('suppresses no-change status in quiet mode', () => {
    expect(decideNotification({ previous: 120, observed: 120, policy: policy() })).toEqual({
      notify: false,
      reason: 'no_change_quiet',
    });
  });

  it('keeps no-change status off when quiet mode is off', () => {
    expect(decideNotification({ previous: 120, observed: 120, policy: policy({ quietMode: false }) })).toEqual({
      notify: false,
      reason: 'no_change_quiet',
    });
  });

  it('ignores changes below the threshold when quiet mode is off', () => {
    expect(
      decideNotification({ previous: 120, observed: 121, policy: policy({ minChangeThreshold: 3, quietMode: false }) }),
    ).toEqual({ notify: false, reason: 'below_threshold' });
  });

  it('sends no-change status only through notifyNoChange', () => {
    expect(decideNotification({ previous: 120, observed: 120, policy: policy({ notifyNoChange: true }) })).toEqual({
      notify: true,
      reason: 'no_change',
    });
    expect(
      decideNotification({
        previous: 120,
        observed: 121,
        policy: policy({ minChangeThreshold: 5, notifyNoChange: true }),
      }),
    ).toEqual({ notify: false, reason: 'below_threshold' });
  });

  it('reports every check with a zero threshold', () => {
    expect(decideNotification({ previous: 120, observed: 120, policy: policy({ minChangeThreshold: 0 }) })).toEqual({
      notify: true,
      reason: 'no_change',
    });
  });

  it.each([true, false])('notifies iff the absolute change reaches the threshold (quietMode=%s)', (quietMode) => {
    const counts = [100, 101, 101, 98, 99, 105, 105];

    for (const threshold of [1, 2, 3]) {
      for (let i = 1; i < counts.length; i++) {
        const previous = counts[i - 1] ?? 0;
        const observed = counts[i] ?? 0;
        const decision = decideNotification({
          previous,
          observed,
          policy: policy({ minChangeThreshold: threshold, quietMode }),
        });
        expect(decision.notify).toBe(Math.abs(observed - previous) >= threshold);
      }
    }
  });
});

describe('formatDelta', () => {
  it('signs the change', () => {
    expect(formatDelta(120, 123)).toBe('+3');
    expect(formatDelta(120, 118)).toBe('-2');
    expect(formatDelta(120, 120)).toBe('±0');
    expect(formatDelta(null, 120)).toBe('±0');
  });
});

describe('composeNotification', () => {
  const detectedAt = new Date('2026-03-01T04:05:06.000Z');
  const content = {
    businessName: 'Test Clinic',
    reviewPageUrl: 'https://example.com/place/1/reviews',
    previous: 120,
    observed: 121,
    reason: 'significant_change' as const,
    detectedAt,
    displayTimeZone: 'Asia/Seoul',
    policy: basePolicy,
  };

  it('describes an increase', () => {
    const message = composeNotification(content);

    expect(message.subject).toBe('Test Clinic reviews up 1: 120 → 121');
    const lines = message.body.split('\n');
    expect(lines).toContain('Previous count: 120');
    expect(lines).toContain('Current count:  121');
    expect(lines).toContain('Change:         +1');
    expect(lines).toContain('Detected at: 2026-03-01 04:05:06 UTC');
    expect(lines).toContain('Reviews: https://example.com/place/1/reviews');
    expect(lines).toContain('  minimum change: 1');
    expect(lines).toContain('  quiet mode: on');
  });

  it('describes a decrease', () => {
    const message = composeNotification({ ...content, observed: 117 });

    expect(message.subject).toBe('Test Clinic reviews down 3: 120 → 117');
    expect(message.body.split('\n')).toContain('Change:         -3');
  });

  it('shows the display timezone time', () => {
    const message = composeNotification(content);
    const zoneLine = message.body.split('\n').find((line) => line.endsWith(' Asia/Seoul'));

    expect(zoneLine?.trim()).toMatch(/^2026-03-01 13:05:06 Asia\/Seoul$/);
  });

  it('uses dedicated subjects for test and startup runs', () => {
    expect(composeNotification({ ...content, reason: 'test' }).subject).toBe('[TEST] Test Clinic review monitor');
    const startup = composeNotification({ ...content, previous: null, reason: 'startup' });
    expect(startup.subject).toBe('Test Clinic review monitor started (121 reviews)');
    expect(startup.body.split('\n')).toContain('Previous count: unknown');
  });

  it('labels no-change status messages', () => {
    const message = composeNotification({ ...content, observed: 120, reason: 'no_change' });
    expect(message.subject).toBe('Test Clinic reviews: 120 (unchanged)');
  });
});
