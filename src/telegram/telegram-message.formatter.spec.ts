import { describe, expect, it } from 'vitest';

import { TELEGRAM_MESSAGE_MAX_LENGTH, TelegramMessageFormatter } from './telegram-message.formatter';
import type { OutboundMessage } from './telegram.interfaces';
import { type AlertPayload, TradeSignal } from '../alerts/alert.interfaces';

const buildPayload = (overrides: Partial<AlertPayload> = {}): AlertPayload => ({
  ticker: 'BTCUSDT',
  signal: TradeSignal.BUY,
  price: 45000.12345679,
  time: '2025-01-15T10:30:00Z',
  ...overrides,
});

describe('TelegramMessageFormatter', (): void => {
  const formatter: TelegramMessageFormatter = new TelegramMessageFormatter();

  it('renders ticker, interval, signal, price and time rows', (): void => {
    const message: OutboundMessage = formatter.format(
      buildPayload({ interval: '1h' }),
      '-1001234567890',
    );

    expect(message).toEqual({
      chat_id: '-1001234567890',
      text: '<b>BTCUSDT</b>  (1h)\nSignal: <i>Buy</i>  Price: 45000.12345679\n🕒 2025-01-15T10:30:00Z',
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  });

  it('omits the interval segment and appends the chart link when present', (): void => {
    const text: string = formatter.buildText(
      buildPayload({
        signal: TradeSignal.SELL,
        price: 0.5,
        chart: 'https://charts.example.test/x?a=1&b=2',
      }),
    );

    expect(text).toBe(
      '<b>BTCUSDT</b>\nSignal: <i>Sell</i>  Price: 0.5\n🕒 2025-01-15T10:30:00Z\n📈 <a href="https://charts.example.test/x?a=1&amp;b=2">Chart</a>',
    );
  });

  it('prints whole prices without trailing zeros', (): void => {
    expect(formatter.buildText(buildPayload({ price: 45000 })).split('\n')[1]).toBe(
      'Signal: <i>Buy</i>  Price: 45000',
    );
  });

  it('escapes markup in user supplied fields', (): void => {
    const text: string = formatter.buildText(
      buildPayload({ ticker: 'A<B>', interval: '1h & 4h', time: '<now>' }),
    );

    expect(text).toBe(
      '<b>A&lt;B&gt;</b>  (1h &amp; 4h)\nSignal: <i>Buy</i>  Price: 45000.12345679\n🕒 &lt;now&gt;',
    );
  });

  it('truncates text to the Telegram message limit', (): void => {
    const message: OutboundMessage = formatter.format(
      buildPayload({ time: 'x'.repeat(5000) }),
      '@signals_channel',
    );

    expect(message.text).toHaveLength(TELEGRAM_MESSAGE_MAX_LENGTH);
    expect(message.text.endsWith('x…')).toBe(true);
  });

  it('drops an oversized chart link instead of cutting its markup', (): void => {
    const text: string = formatter.buildText(
      buildPayload({ chart: `https://charts.example.test/${'a'.repeat(5000)}` }),
    );

    expect(text).toBe('<b>BTCUSDT</b>\nSignal: <i>Buy</i>  Price: 45000.12345679\n🕒 2025-01-15T10:30:00Z');
  });

  it('never splits an escaped entity when clipping the time', (): void => {
    const text: string = formatter.buildText(buildPayload({ time: '&'.repeat(2000) }));

    expect(text).toHaveLength(TELEGRAM_MESSAGE_MAX_LENGTH);
    expect(text.split('\n')[2]).toBe(`🕒 ${'&amp;'.repeat(807)}…`);
  });

  it('shares the remaining room between a long interval and a long time', (): void => {
    const text: string = formatter.buildText(
      buildPayload({ interval: 'i'.repeat(3000), time: 't'.repeat(3000) }),
    );
    const rows: string[] = text.split('\n');

    expect(text).toHaveLength(TELEGRAM_MESSAGE_MAX_LENGTH);
    expect(rows[0]).toBe(`<b>BTCUSDT</b>  (${'i'.repeat(2015)}…)`);
    expect(rows[2]).toBe(`🕒 ${'t'.repeat(2015)}…`);
  });
});
