import { ConfigError, loadEnv, type Env } from './config/env.js';
import { createLogger } from './lib/logger.js';
import { createReviewSource } from './api/review-source.js';
import { assertMailConfig, createMailer, MailConfigError, type Mailer } from './alerts/mailer.js';
import { runMonitorCycle, type MonitorDeps } from './pipeline/monitor-cycle.js';
import { createJsonHistoryStore } from './storage/history-store.js';
import { syncResults } from './storage/git-sync.js';
import { createScheduler } from './scheduler/index.js';
import { startHealthServer, stopHealthServer } from './health/server.js';

function buildMonitorDeps(env: Env): MonitorDeps {
  let mailer: Mailer | null = null;
  let mailerError: MailConfigError | undefined;
  let recipient: string | null = null;
  try {
    const mailConfig = assertMailConfig(env);
    mailer = createMailer(mailConfig);
    recipient = mailConfig.recipient;
  } catch (err) {
    // Reported by the cycle only when a notification is actually due.
    if (!(err instanceof MailConfigError)) throw err;
    mailerError = err;
  }

  return {
    source: createReviewSource({
      urls: env.REVIEW_SOURCE_URLS,
      timeoutMs: env.FETCH_TIMEOUT_MS,
      bounds: { min: env.REVIEW_COUNT_MIN, max: env.REVIEW_COUNT_MAX },
    }),
    history: createJsonHistoryStore(env.HISTORY_FILE),
    mailer,
    mailerError,
    settings: {
      policy: {
        testMode: env.TEST_MODE,
        minChangeThreshold: env.MIN_CHANGE_THRESHOLD,
        quietMode: env.QUIET_MODE,
        notifyNoChange: env.NOTIFY_NO_CHANGE,
        notifyStartup: env.NOTIFY_STARTUP,
      },
      businessName: env.BUSINESS_NAME,
      reviewPageUrl: env.REVIEW_PAGE_URL ?? env.REVIEW_SOURCE_URLS[0] ?? '',
      displayTimeZone: env.DISPLAY_TIMEZONE,
      recipient,
    },
  };
}

async function persistResults(env: Env): Promise<void> {
  await syncResults({
    files: [env.HISTORY_FILE, env.LOG_FILE],
    authorName: env.GIT_AUTHOR_NAME,
    authorEmail: env.GIT_AUTHOR_EMAIL,
    token: env.GITHUB_TOKEN,
    repository: env.GITHUB_REPOSITORY,
  });
}

async function runOnce(env: Env): Promise<number> {
  const deps = buildMonitorDeps(env);
  const result = await runMonitorCycle(deps);

  if (env.PERSIST_RESULTS) {
    await persistResults(env);
  }

  return result.status === 'ok' ? 0 : 1;
}

async function runDaemon(env: Env): Promise<void> {
  const logger = createLogger();
  const deps = buildMonitorDeps(env);
  const intervalMs = env.MONITOR_INTERVAL_SECONDS * 1000;

  const scheduler = createScheduler({
    intervalMs,
    runCycle: () => runMonitorCycle(deps),
    afterCycle: env.PERSIST_RESULTS ? () => persistResults(env) : undefined,
  });
  scheduler.start();
  logger.info({ intervalMs }, 'Review monitor scheduler started');

  await startHealthServer(env.MONITOR_HEALTH_PORT, {
    history: deps.history,
    getState: () => scheduler.getState(),
    intervalMs,
  });
  logger.info({ port: env.MONITOR_HEALTH_PORT }, 'Health check server started');

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');

    try {
      await scheduler.stop();
      await stopHealthServer();
      logger.info('Health server stopped');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, `Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

async function main() {
  // 1. Load and validate environment
  let env: Env;
  try {
    env = loadEnv();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  // 2. Initialize logger
  const logger = createLogger();

  if (process.argv.includes('--daemon')) {
    await runDaemon(env);
    return;
  }

  const exitCode = await runOnce(env);
  logger.info({ exitCode }, exitCode === 0 ? 'Review monitor finished' : 'Review monitor finished with errors');
  process.exitCode = exitCode;
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
