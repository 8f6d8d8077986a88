import * as Sentry from "@sentry/node";
import { config } from "./env";

export function initSentry() {
  if (!config.SENTRY_DSN) return;

  Sentry.init({
    dsn: config.SENTRY_DSN,

    // Adjust this value in production, or use tracesSampler for greater control
    tracesSampleRate: config.NODE_ENV === "production" ? 0.1 : 1.0,

    debug: config.NODE_ENV === "development",

    environment: config.NODE_ENV,

    initialScope: { tags: { service: "packsize-insights-backend" } },
  });
}
