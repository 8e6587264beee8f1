export enum SignatureFailureReason {
  MISSING_SIGNATURE = 'missing_signature',
  SECRET_NOT_CONFIGURED = 'secret_not_configured',
  MALFORMED_SIGNATURE = 'malformed_signature',
  MISMATCH = 'mismatch',
}

export class SignatureError extends Error {
  public constructor(public readonly reason: SignatureFailureReason) {
    super(`Webhook signature rejected: ${reason}`);
    this.name = SignatureError.name;
  }
}
