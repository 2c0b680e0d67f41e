import type { ReviewSource } from '../api/review-source.js';
import { MailConfigError, type Mailer } from '../alerts/mailer.js';
import {
  composeNotification,
  decideNotification,
  type NotificationPolicy,
} from '../alerts/notify.js';
import type { HistoryStore, RunRecord } from '../storage/history-store.js';
import { getLogger } from '../lib/logger.js';

export interface MonitorSettings {
  policy: NotificationPolicy;
  businessName: string;
  reviewPageUrl: string;
  displayTimeZone: string;
  /** Null when the mail settings are incomplete. */
  recipient: string | null;
}

export interface MonitorDeps {
  source: ReviewSource;
  history: HistoryStore;
  /** Null when the mail settings are incomplete. */
  mailer: Mailer | null;
  /** Reason the mailer is missing, reported when a notification is due. */
  mailerError?: MailConfigError;
  settings: MonitorSettings;
  now?: () => Date;
}

export interface CycleResult {
  status: 'ok' | 'failed';
  record: RunRecord | null;
  errors: string[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One monitoring pass: read the baseline, fetch the current count, decide and
 * send the notification, then append exactly one run record.
 */
export async function runMonitorCycle(deps: MonitorDeps): Promise<CycleResult> {
  const logger = getLogger();
  const now = deps.now ?? (() => new Date());
  const { settings } = deps;
  const errors: string[] = [];

  logger.info(
    {
      testMode: settings.policy.testMode,
      minChangeThreshold: settings.policy.minChangeThreshold,
      quietMode: settings.policy.quietMode,
    },
    'Review monitor run starting',
  );

  // 1. Baseline
  let latest: RunRecord | null;
  try {
    latest = await deps.history.latest();
  } catch (err) {
    logger.error({ err }, `Could not read review history, run aborted: ${errorMessage(err)}`);
    return { status: 'failed', record: null, errors: [errorMessage(err)] };
  }
  const previous = latest ? latest.observed : null;
  logger.info({ previous }, previous === null ? 'No baseline count' : `Previous count: ${previous}`);

  // 2. Fetch
  let observed: number | null = null;
  let sourceUrl: string | undefined;
  try {
    const result = await deps.source.fetch();
    observed = result.count;
    sourceUrl = result.url;
    logger.info({ observed, url: sourceUrl }, `Current count: ${observed}`);
  } catch (err) {
    logger.error({ err }, `Review count fetch failed: ${errorMessage(err)}`);
    errors.push(errorMessage(err));
  }

  // 3. Delta
  const delta = observed !== null && previous !== null ? observed - previous : null;

  // 4. Decision
  const decision = decideNotification({ previous, observed, policy: settings.policy });
  logger.info({ ...decision, delta }, decision.notify ? 'Notification due' : 'No notification');

  const record: RunRecord = {
    timestamp: now().toISOString(),
    observed,
    previous,
    delta,
    notified: false,
    reason: decision.reason,
  };
  if (observed === null) {
    record.error = 'fetch_failed';
    record.errorMessage = errors[0];
  }
  if (sourceUrl) record.sourceUrl = sourceUrl;

  // 5. Notification
  if (decision.notify && observed !== null) {
    if (!deps.mailer || !settings.recipient) {
      const configError = deps.mailerError ?? new MailConfigError(['RECIPIENT_EMAIL']);
      logger.error({ missing: configError.missing }, configError.message);
      record.error = 'notify_config_missing';
      record.errorMessage = configError.message;
      errors.push(configError.message);
    } else {
      const message = composeNotification({
        businessName: settings.businessName,
        reviewPageUrl: settings.reviewPageUrl,
        previous,
        observed,
        reason: decision.reason,
        detectedAt: new Date(record.timestamp),
        displayTimeZone: settings.displayTimeZone,
        policy: settings.policy,
      });

      try {
        await deps.mailer.send({ ...message, to: settings.recipient });
        record.notified = true;
      } catch (err) {
        logger.error({ err }, `Notification failed: ${errorMessage(err)}`);
        record.error = 'notify_failed';
        record.errorMessage = errorMessage(err);
        errors.push(errorMessage(err));
      }
    }
  }

  // 6. Record
  try {
    await deps.history.append(record);
  } catch (err) {
    logger.error({ err }, `Could not append run record: ${errorMessage(err)}`);
    errors.push(errorMessage(err));
    return { status: 'failed', record, errors };
  }

  const status = errors.length === 0 ? 'ok' : 'failed';
  logger.info(
    {
      previous,
      observed,
      delta,
      notified: record.notified,
      reason: record.reason,
      ...(record.error ? { error: record.error } : {}),
    },
    `Run ${status}: ${previous ?? 'n/a'} → ${observed ?? 'n/a'}`,
  );

  return { status, record, errors };
}
