import { Test, type TestingModule } from '@nestjs/testing';
import type { NestExpressApplication } from '@nestjs/platform-express';
import type { Telegram } from 'telegraf';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { applyTestEnv } from './helpers/test-env';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { signWebhookPayload } from '../src/security/webhook-signature.service';
import { TELEGRAM_CLIENT } from '../src/telegram/telegram.interfaces';

type TelegramClientStub = {
  readonly callApi: ReturnType<typeof vi.fn>;
  readonly getMe: ReturnType<typeof vi.fn>;
};

type HttpServerWithAddress = {
  address: () => {
    port: number;
  };
};

interface ITestApp {
  readonly app: NestExpressApplication;
  readonly baseUrl: string;
  readonly telegramStub: TelegramClientStub;
}

const startApp = async (envOverrides: Readonly<Record<string, string>> = {}): Promise<ITestApp> => {
  applyTestEnv(envOverrides);

  const telegramStub: TelegramClientStub = {
    callApi: vi.fn().mockResolvedValue({ message_id: 1 }),
    getMe: vi.fn().mockResolvedValue({ id: 1, is_bot: true, username: 'relay_bot' }),
  };
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(TELEGRAM_CLIENT)
    .useValue(telegramStub as unknown as Telegram)
    .compile();

  const app: NestExpressApplication = moduleFixture.createNestApplication<NestExpressApplication>({
    bodyParser: false,
  });
  configureApp(app);
  await app.init();
  await app.listen(0);

  const httpServer: HttpServerWithAddress = app.getHttpServer() as HttpServerWithAddress;
  const serverAddress: { port: number } = httpServer.address();

  return {
    app,
    baseUrl: `http://127.0.0.1:${serverAddress.port.toString()}`,
    telegramStub,
  };
};

const postWebhook = async (
  baseUrl: string,
  rawBody: string,
  headers: Record<string, string> = {},
): Promise<Response> =>
  fetch(`${baseUrl}/webhook`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: rawBody,
  });

describe('Webhook relay (e2e)', (): void => {
  let testApp: ITestApp;

  beforeAll(async (): Promise<void> => {
    testApp = await startApp();
  });

  afterAll(async (): Promise<void> => {
    await testApp.app.close().catch((): void => undefined);
  });

  it('accepts an alert and delivers the formatted message to Telegram', async (): Promise<void> => {
    const response: Response = await postWebhook(
      testApp.baseUrl,
      JSON.stringify({
        ticker: 'btcusdt',
        signal: 'BUY',
        price: 45000.123456789,
        time: '2025-01-15T10:30:00Z',
        interval: '1h',
      }),
      { 'X-Request-ID': 'e2e-req-1' },
    );
    const body: unknown = await response.json();

    expect(response.status).toBe(202);
    expect(response.headers.get('x-request-id')).toBe('e2e-req-1');
    expect(body).toMatchObject({
      status: 'accepted',
      message: 'Webhook received and processing',
      request_id: 'e2e-req-1',
    });

    await vi.waitFor((): void => {
      expect(testApp.telegramStub.callApi).toHaveBeenCalledWith(
        'sendMessage',
        {
          chat_id: '-1001234567890',
          text: '<b>BTCUSDT</b>  (1h)\nSignal: <i>Buy</i>  Price: 45000.12345679\n🕒 2025-01-15T10:30:00Z',
          parse_mode: 'HTML',
          link_preview_options: { is_disabled: true },
        },
        { signal: expect.any(AbortSignal) },
      );
    });
  });

  it('forwards a repeated alert only once', async (): Promise<void> => {
    const rawBody: string = JSON.stringify({
      ticker: 'ETHUSDT',
      signal: 'sell',
      price: 3100,
      time: '2025-01-15T11:00:00Z',
    });

    const firstResponse: Response = await postWebhook(testApp.baseUrl, rawBody);
    const secondResponse: Response = await postWebhook(
      testApp.baseUrl,
      rawBody.replace('3100', '3105'),
    );

    expect(firstResponse.status).toBe(202);
    expect(secondResponse.status).toBe(202);

    await vi.waitFor(async (): Promise<void> => {
      const metrics: string = await (await fetch(`${testApp.baseUrl}/metrics`)).text();
      expect(metrics).toContain('alert_deliveries_total{outcome="skipped"} 1');
    });

    const ethMessages: unknown[] = testApp.telegramStub.callApi.mock.calls.filter(
      ([, params]: unknown[]): boolean =>
        typeof params === 'object' &&
        params !== null &&
        'text' in params &&
        typeof params.text === 'string' &&
        params.text.startsWith('<b>ETHUSDT</b>'),
    );
    expect(ethMessages).toHaveLength(1);
  });

  it('answers 422 with field errors for an invalid alert', async (): Promise<void> => {
    const response: Response = await postWebhook(testApp.baseUrl, '{"ticker":""}');
    const body: unknown = await response.json();

    expect(response.status).toBe(422);
    expect(body).toMatchObject({ status: 'error', message: 'Invalid webhook data' });
    expect(body).toHaveProperty('request_id');
    expect(body).toHaveProperty(
      'errors',
      expect.arrayContaining([{ field: 'ticker', message: 'ticker must not be empty' }]),
    );
  });

  it('answers 400 for a body that is not JSON', async (): Promise<void> => {
    const response: Response = await postWebhook(testApp.baseUrl, 'BTCUSDT buy 45000', {
      'Content-Type': 'text/plain',
    });
    const body: unknown = await response.json();

    expect(response.status).toBe(400);
    expect(body).toMatchObject({ status: 'error', message: 'Invalid JSON payload' });
    expect(response.headers.get('x-request-id')).not.toBeNull();
  });

  it('accepts a JSON alert sent without a Content-Type header', async (): Promise<void> => {
    const rawBody: string = JSON.stringify({
      ticker: 'ADAUSDT',
      signal: 'buy',
      price: 0.45,
      time: '2025-01-15T13:00:00Z',
    });
    const response: Response = await fetch(`${testApp.baseUrl}/webhook`, {
      method: 'POST',
      body: new TextEncoder().encode(rawBody),
    });

    expect(response.status).toBe(202);
    expect(await response.json()).toMatchObject({ status: 'accepted' });
  });

  it('answers 413 for a body over the size limit', async (): Promise<void> => {
    const rawBody: string = JSON.stringify({
      ticker: 'BTCUSDT',
      signal: 'buy',
      price: 45000,
      time: '2025-01-15T14:00:00Z',
      interval: 'x'.repeat(200 * 1024),
    });

    const response: Response = await postWebhook(testApp.baseUrl, rawBody);
    const body: unknown = await response.json();

    expect(response.status).toBe(413);
    expect(body).toMatchObject({ status: 'error', message: 'request entity too large' });
    expect(body).toHaveProperty('request_id');
  });

  it('reports liveness and Telegram connectivity', async (): Promise<void> => {
    const healthResponse: Response = await fetch(`${testApp.baseUrl}/health`);
    const telegramResponse: Response = await fetch(`${testApp.baseUrl}/health/telegram`);
    const rootResponse: Response = await fetch(`${testApp.baseUrl}/`);

    expect(healthResponse.status).toBe(200);
    expect(await healthResponse.json()).toMatchObject({
      status: 'healthy',
      service: 'trading-signal-relay',
    });
    expect(await telegramResponse.json()).toMatchObject({
      status: 'healthy',
      telegram_connected: true,
    });
    expect(await rootResponse.json()).toMatchObject({
      service: 'trading-signal-relay',
      status: 'running',
      docs_url: null,
    });
  });

  it('serves Prometheus metrics', async (): Promise<void> => {
    const response: Response = await fetch(`${testApp.baseUrl}/metrics`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/plain');
    expect(await response.text()).toContain('webhook_requests_total{outcome="accepted"}');
  });

  it('wraps unknown routes in the error envelope', async (): Promise<void> => {
    const response: Response = await fetch(`${testApp.baseUrl}/missing`);
    const body: unknown = await response.json();

    expect(response.status).toBe(404);
    expect(body).toMatchObject({ status: 'error' });
  });
});

describe('Webhook signature enforcement (e2e)', (): void => {
  let testApp: ITestApp;

  const rawBody: string = JSON.stringify({
    ticker: 'SOLUSDT',
    signal: 'buy',
    price: 142.5,
    time: '2025-01-15T12:00:00Z',
  });

  beforeAll(async (): Promise<void> => {
    testApp = await startApp({ WEBHOOK_SIGNATURE_REQUIRED: 'true' });
  });

  afterAll(async (): Promise<void> => {
    await testApp.app.close().catch((): void => undefined);
  });

  it('rejects an unsigned webhook with 403', async (): Promise<void> => {
    const response: Response = await postWebhook(testApp.baseUrl, rawBody);
    const body: unknown = await response.json();

    expect(response.status).toBe(403);
    expect(body).toMatchObject({ status: 'error', message: 'Invalid webhook signature' });
    expect(testApp.telegramStub.callApi).not.toHaveBeenCalled();
  });

  it('accepts a webhook signed with the shared secret', async (): Promise<void> => {
    const response: Response = await postWebhook(testApp.baseUrl, rawBody, {
      'X-Signature': `sha256=${signWebhookPayload(rawBody, 'test-secret')}`,
    });

    expect(response.status).toBe(202);
    await vi.waitFor((): void => {
      expect(testApp.telegramStub.callApi).toHaveBeenCalledTimes(1);
    });
  });
});
