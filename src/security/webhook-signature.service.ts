import { Injectable } from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'node:crypto';

import { SignatureError, SignatureFailureReason } from './signature.error';
import { AppConfigService } from '../config/app-config.service';

export const SIGNATURE_HEADER = 'X-Signature';

const SIGNATURE_PREFIX = 'sha256=';
const SHA256_HEX_PATTERN: RegExp = /^[0-9a-f]{64}$/i;

/** Hex HMAC-SHA256 of the body, the value a sender puts into `X-Signature`. */
export const signWebhookPayload = (payload: Buffer | string, secret: string): string =>
  createHmac('sha256', secret).update(payload).digest('hex');

@Injectable()
export class WebhookSignatureService {
  public constructor(private readonly appConfigService: AppConfigService) {}

  public verify(rawBody: Buffer | string, providedSignature: string | undefined): true {
    const signature: string = this.normalizeSignature(providedSignature);
    const secret: string = this.appConfigService.webhookSecret;

    if (secret.length === 0) {
      throw new SignatureError(SignatureFailureReason.SECRET_NOT_CONFIGURED);
    }

    if (!SHA256_HEX_PATTERN.test(signature)) {
      throw new SignatureError(SignatureFailureReason.MALFORMED_SIGNATURE);
    }

    if (!this.hashesEqual(signWebhookPayload(rawBody, secret), signature)) {
      throw new SignatureError(SignatureFailureReason.MISMATCH);
    }

    return true;
  }

  private normalizeSignature(providedSignature: string | undefined): string {
    const trimmed: string = providedSignature?.trim() ?? '';
    const signature: string = trimmed.toLowerCase().startsWith(SIGNATURE_PREFIX)
      ? trimmed.slice(SIGNATURE_PREFIX.length)
      : trimmed;

    if (signature.length === 0) {
      throw new SignatureError(SignatureFailureReason.MISSING_SIGNATURE);
    }

    return signature;
  }

  private hashesEqual(leftHashHex: string, rightHashHex: string): boolean {
    const leftBuffer: Buffer = Buffer.from(leftHashHex, 'hex');
    const rightBuffer: Buffer = Buffer.from(rightHashHex, 'hex');

    if (leftBuffer.length !== rightBuffer.length) {
      return false;
    }

    return timingSafeEqual(leftBuffer, rightBuffer);
  }
}
