import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

// -- Webhook --

export const WEBHOOK_ALERT_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    ticker: { type: 'string', example: 'BTCUSDT', maxLength: 20 },
    signal: { type: 'string', enum: ['buy', 'sell'], example: 'buy' },
    price: { oneOf: [{ type: 'number' }, { type: 'string' }], example: 45000.12345678 },
    time: { type: 'string', example: '2025-01-15T10:30:00Z' },
    interval: { type: 'string', nullable: true, example: '1h' },
    chart: {
      type: 'string',
      nullable: true,
      example: 'https://www.tradingview.com/chart/abc123/',
    },
  },
  required: ['ticker', 'signal', 'price', 'time'],
};

export const WEBHOOK_ACCEPTED_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'accepted' },
    message: { type: 'string', example: 'Webhook received and processing' },
    request_id: { type: 'string', format: 'uuid' },
    timestamp: { type: 'string', format: 'date-time' },
  },
  required: ['status', 'message', 'request_id', 'timestamp'],
};

export const ERROR_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'error' },
    message: { type: 'string', example: 'Invalid webhook data' },
    request_id: { type: 'string' },
    errors: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          field: { type: 'string', example: 'ticker' },
          message: { type: 'string', example: 'ticker must not be empty' },
        },
        required: ['field', 'message'],
      },
    },
  },
  required: ['status', 'message', 'request_id'],
};

// -- Health --

export const HEALTH_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'healthy' },
    timestamp: { type: 'number', example: 1736937000.123 },
    service: { type: 'string', example: 'trading-signal-relay' },
    version: { type: 'string', example: '0.1.0' },
  },
  required: ['status', 'timestamp', 'service', 'version'],
};

export const TELEGRAM_HEALTH_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['healthy', 'unhealthy'] },
    telegram_connected: { type: 'boolean' },
    timestamp: { type: 'number', example: 1736937000.123 },
    error: { type: 'string' },
  },
  required: ['status', 'telegram_connected', 'timestamp'],
};

export const SERVICE_INFO_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    service: { type: 'string', example: 'trading-signal-relay' },
    version: { type: 'string', example: '0.1.0' },
    status: { type: 'string', example: 'running' },
    timestamp: { type: 'number', example: 1736937000.123 },
    docs_url: { type: 'string', nullable: true, example: '/docs' },
  },
  required: ['service', 'version', 'status', 'timestamp', 'docs_url'],
};
