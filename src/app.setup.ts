import type { NestExpressApplication } from '@nestjs/platform-express';

import { AppConfigService } from './config/app-config.service';

export const REQUEST_BODY_LIMIT = '100kb';

const ANY_ORIGIN = '*';

// Matches requests without a Content-Type too, which a '*/*' pattern skips.
const acceptAnyContentType = (): boolean => true;

/**
 * HTTP wiring shared by the entrypoint and the e2e suite. Bodies stay raw bytes so the
 * signature guard can hash exactly what was sent; the webhook controller parses JSON itself.
 * The application must be created with `bodyParser: false`.
 */
export const configureApp = (app: NestExpressApplication): void => {
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const allowedOrigins: readonly string[] = appConfigService.corsAllowedOrigins;

  app.useBodyParser('raw', { type: acceptAnyContentType, limit: REQUEST_BODY_LIMIT });
  app.enableCors({
    origin: allowedOrigins.includes(ANY_ORIGIN) ? true : [...allowedOrigins],
  });
};
