import * as Sentry from '@sentry/node';
import { config } from './env';

export function initSentry() {
  Sentry.init({
    // No DSN = SDK stays inert; captureException calls become no-ops.
    dsn: config.SENTRY_DSN,

    // Adjust this value in production, or use tracesSampler for greater control
    tracesSampleRate: config.NODE_ENV === 'production' ? 0.1 : 1.0,

    debug: config.NODE_ENV === 'development' && Boolean(config.SENTRY_DSN),

    environment: config.NODE_ENV,
  });
}
