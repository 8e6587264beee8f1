import { Injectable } from '@nestjs/common';

import type { OutboundMessage } from './telegram.interfaces';
import type { AlertPayload } from '../alerts/alert.interfaces';

export const TELEGRAM_MESSAGE_MAX_LENGTH = 4096;
const TRUNCATION_SUFFIX = '…';

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

/** Escapes `raw` and cuts it to `maxLength` on a character boundary, never inside an entity. */
const clipEscaped = (raw: string, maxLength: number): string => {
  const escaped: string = escapeHtml(raw);

  if (escaped.length <= maxLength) {
    return escaped;
  }

  let clipped: string = '';

  for (const character of raw) {
    const escapedCharacter: string = escapeHtml(character);

    if (clipped.length + escapedCharacter.length + TRUNCATION_SUFFIX.length > maxLength) {
      break;
    }

    clipped += escapedCharacter;
  }

  return `${clipped}${TRUNCATION_SUFFIX}`;
};

interface IRenderedFields {
  readonly interval: string | undefined;
  readonly time: string;
  readonly chart: string | undefined;
}

@Injectable()
export class TelegramMessageFormatter {
  public format(payload: AlertPayload, chatId: string): OutboundMessage {
    return {
      chat_id: chatId,
      text: this.buildText(payload),
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    };
  }

  /**
   * Renders the alert, keeping the result within {@link TELEGRAM_MESSAGE_MAX_LENGTH}.
   * On overflow the chart row is dropped first; then interval and time are clipped
   * before markup is applied.
   */
  public buildText(payload: AlertPayload): string {
    const interval: string | undefined =
      payload.interval === undefined ? undefined : escapeHtml(payload.interval);
    const time: string = escapeHtml(payload.time);
    const chart: string | undefined =
      payload.chart === undefined ? undefined : escapeHtml(payload.chart);

    const fullText: string = this.render(payload, { interval, time, chart });

    if (fullText.length <= TELEGRAM_MESSAGE_MAX_LENGTH) {
      return fullText;
    }

    const withoutChart: string = this.render(payload, { interval, time, chart: undefined });

    if (withoutChart.length <= TELEGRAM_MESSAGE_MAX_LENGTH) {
      return withoutChart;
    }

    const fixedLength: number = this.render(payload, {
      interval: interval === undefined ? undefined : '',
      time: '',
      chart: undefined,
    }).length;
    const budget: number = TELEGRAM_MESSAGE_MAX_LENGTH - fixedLength;
    const clippedInterval: string | undefined =
      payload.interval === undefined || interval === undefined
        ? undefined
        : clipEscaped(payload.interval, Math.min(interval.length, Math.floor(budget / 2)));
    const clippedTime: string = clipEscaped(
      payload.time,
      budget - (clippedInterval?.length ?? 0),
    );

    return this.render(payload, { interval: clippedInterval, time: clippedTime, chart: undefined });
  }

  private render(payload: AlertPayload, fields: IRenderedFields): string {
    const ticker: string = `<b>${escapeHtml(payload.ticker)}</b>`;
    const rows: string[] = [
      fields.interval === undefined ? ticker : `${ticker}  (${fields.interval})`,
      `Signal: <i>${payload.signal}</i>  Price: ${String(payload.price)}`,
      `🕒 ${fields.time}`,
    ];

    if (fields.chart !== undefined) {
      rows.push(`📈 <a href="${fields.chart}">Chart</a>`);
    }

    return rows.join('\n');
  }
}
