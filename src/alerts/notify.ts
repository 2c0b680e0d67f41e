/**
 * Notification policy: whether a run should email, and what the email says.
 */

export type NotificationReason =
  | 'test'
  | 'startup'
  | 'startup_disabled'
  | 'significant_change'
  | 'below_threshold'
  | 'no_change'
  | 'no_change_quiet'
  | 'fetch_failed';

export interface NotificationPolicy {
  testMode: boolean;
  minChangeThreshold: number;
  quietMode: boolean;
  notifyNoChange: boolean;
  notifyStartup: boolean;
}

export interface DecisionInput {
  previous: number | null;
  /** Null when the fetch failed. */
  observed: number | null;
  policy: NotificationPolicy;
}

export interface NotificationDecision {
  notify: boolean;
  reason: NotificationReason;
}

export function decideNotification({ previous, observed, policy }: DecisionInput): NotificationDecision {
  // Without a count there is no delta to report.
  if (observed === null) {
    return { notify: false, reason: 'fetch_failed' };
  }

  if (policy.testMode) {
    return { notify: true, reason: 'test' };
  }

  if (previous === null) {
    return policy.notifyStartup
      ? { notify: true, reason: 'startup' }
      : { notify: false, reason: 'startup_disabled' };
  }

  const change = Math.abs(observed - previous);
  // A zero threshold reports every check, changed or not.
  if (change >= policy.minChangeThreshold) {
    return { notify: true, reason: change === 0 ? 'no_change' : 'significant_change' };
  }

  // Quiet mode only shapes the email; the no-change status is opt-in on its own.
  if (change === 0) {
    return policy.notifyNoChange
      ? { notify: true, reason: 'no_change' }
      : { notify: false, reason: 'no_change_quiet' };
  }

  return { notify: false, reason: 'below_threshold' };
}

// ─── Message Composition ─────────────────────────────────────────────────────

export interface NotificationContent {
  businessName: string;
  reviewPageUrl: string;
  previous: number | null;
  observed: number;
  reason: NotificationReason;
  detectedAt: Date;
  displayTimeZone: string;
  policy: NotificationPolicy;
}

export interface NotificationMessage {
  subject: string;
  body: string;
}

export function formatDelta(previous: number | null, observed: number): string {
  if (previous === null) return '±0';
  const delta = observed - previous;
  if (delta > 0) return `+${delta}`;
  if (delta < 0) return String(delta);
  return '±0';
}

function describeChange(previous: number | null, observed: number): string {
  const delta = previous === null ? 0 : observed - previous;
  if (delta > 0) return `up ${delta}`;
  if (delta < 0) return `down ${Math.abs(delta)}`;
  return 'unchanged';
}

function formatTime(date: Date, timeZone: string): string {
  // sv-SE renders as YYYY-MM-DD HH:MM:SS
  return new Intl.DateTimeFormat('sv-SE', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  }).format(date);
}

function onOff(value: boolean): string {
  return value ? 'on' : 'off';
}

export function composeNotification(content: NotificationContent): NotificationMessage {
  const { businessName, previous, observed, reason, policy } = content;
  const delta = formatDelta(previous, observed);

  let subject: string;
  switch (reason) {
    case 'test':
      subject = `[TEST] ${businessName} review monitor`;
      break;
    case 'startup':
      subject = `${businessName} review monitor started (${observed} reviews)`;
      break;
    case 'no_change':
    case 'below_threshold':
      subject = `${businessName} reviews: ${observed} (${describeChange(previous, observed)})`;
      break;
    default:
      subject = `${businessName} reviews ${describeChange(previous, observed)}: ${previous ?? 'unknown'} → ${observed}`;
  }

  const body = [
    `${businessName} review count update`,
    '',
    `Previous count: ${previous ?? 'unknown'}`,
    `Current count:  ${observed}`,
    `Change:         ${delta}`,
    '',
    `Detected at: ${content.detectedAt.toISOString().slice(0, 19).replace('T', ' ')} UTC`,
    `             ${formatTime(content.detectedAt, content.displayTimeZone)} ${content.displayTimeZone}`,
    '',
    `Reviews: ${content.reviewPageUrl}`,
    '',
    'Notification settings:',
    `  minimum change: ${policy.minChangeThreshold}`,
    `  quiet mode: ${onOff(policy.quietMode)}`,
    `  no-change notifications: ${onOff(policy.notifyNoChange)}`,
    `  startup notification: ${onOff(policy.notifyStartup)}`,
    `  test mode: ${onOff(policy.testMode)}`,
    '',
    'This message was sent automatically by the review monitor.',
  ].join('\n');

  return { subject, body };
}
