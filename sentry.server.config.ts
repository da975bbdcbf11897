// This file configures the initialization of Sentry on the server.
// The config you add here will be used whenever the server handles a request.
// https://docs.sentry.io/platforms/javascript/guides/nextjs/

import * as Sentry from "@sentry/nextjs";
import { scrubEventSecrets } from "@/lib/sentry-secrets";

const dsn = process.env.SENTRY_DSN;

Sentry.init({
  dsn: dsn || undefined,

  tracesSampleRate: 0.1,

  // Never send default PII.
  sendDefaultPii: false,

  beforeSend(event) {
    return scrubEventSecrets(event);
  },
});
