export interface WebhookAcceptedResponse {
  readonly status: 'accepted';
  readonly message: string;
  readonly request_id: string;
  readonly timestamp: string;
}

export enum WebhookOutcome {
  ACCEPTED = 'accepted',
  INVALID_JSON = 'invalid_json',
  INVALID_PAYLOAD = 'invalid_payload',
  REJECTED_SIGNATURE = 'rejected_signature',
  QUEUE_FULL = 'queue_full',
  SHUTTING_DOWN = 'shutting_down',
}
