import { Injectable } from '@nestjs/common';
import { z } from 'zod';

import { AlertValidationError } from './alert-validation.error';
import { type AlertPayload, type AlertValidationIssue, TradeSignal } from './alert.interfaces';

const TICKER_MAX_LENGTH = 20;
const PRICE_FRACTION_DIGITS = 8;
const NUMERIC_STRING_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const HTTP_URL_PATTERN = /^https?:\/\//;

export const roundPrice = (value: number): number => Number(value.toFixed(PRICE_FRACTION_DIGITS));

const requiredFieldError =
  (field: string, expected: string) =>
  (issue: { readonly input?: unknown }): string =>
    issue.input === undefined || issue.input === null
      ? `${field} is required`
      : `${field} must be ${expected}`;

const optionalTextSchema = z
  .string()
  .nullish()
  .transform((value: string | null | undefined): string | undefined => {
    const trimmedValue: string | undefined = value?.trim();

    return trimmedValue ? trimmedValue : undefined;
  });

export const alertPayloadSchema = z.object(
  {
    ticker: z
      .string({ error: requiredFieldError('ticker', 'a string') })
      .trim()
      .min(1, { error: 'ticker must not be empty' })
      .max(TICKER_MAX_LENGTH, { error: 'ticker must be at most 20 characters' })
      .transform((value: string): string => value.toUpperCase()),
    signal: z
      .string({ error: requiredFieldError('signal', 'a string') })
      .trim()
      .toLowerCase()
      .refine((value: string): boolean => value === 'buy' || value === 'sell', {
        error: 'signal must be Buy or Sell',
      })
      .transform((value: string): TradeSignal =>
        value === 'buy' ? TradeSignal.BUY : TradeSignal.SELL,
      ),
    price: z
      .union(
        [
          z.number(),
          z
            .string()
            .trim()
            .regex(NUMERIC_STRING_PATTERN)
            .transform((value: string): number => Number(value)),
        ],
        { error: requiredFieldError('price', 'a number') },
      )
      .refine((value: number): boolean => Number.isFinite(value), {
        error: 'price must be a finite number',
      })
      .transform(roundPrice)
      .refine((value: number): boolean => value > 0, { error: 'price must be greater than 0' }),
    time: z
      .string({ error: requiredFieldError('time', 'a string') })
      .trim()
      .min(1, { error: 'time must not be empty' }),
    interval: optionalTextSchema,
    chart: optionalTextSchema.refine(
      (value: string | undefined): boolean => value === undefined || HTTP_URL_PATTERN.test(value),
      { error: 'chart must be an http or https URL' },
    ),
  },
  { error: 'body must be a JSON object' },
);

@Injectable()
export class AlertPayloadValidator {
  /** Normalizes raw webhook JSON into an {@link AlertPayload} or throws with every failing field. */
  public validate(input: unknown): AlertPayload {
    const result = alertPayloadSchema.safeParse(input);

    if (!result.success) {
      const issues: AlertValidationIssue[] = result.error.issues.map(
        (issue): AlertValidationIssue => ({
          field: issue.path.length > 0 ? issue.path.map(String).join('.') : 'body',
          message: issue.message,
        }),
      );
      throw new AlertValidationError(issues);
    }

    const { ticker, signal, price, time, interval, chart } = result.data;

    return {
      ticker,
      signal,
      price,
      time,
      ...(interval === undefined ? {} : { interval }),
      ...(chart === undefined ? {} : { chart }),
    };
  }
}
