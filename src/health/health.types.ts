export type ComponentStatus = 'healthy' | 'unhealthy';

export type AppHealthStatus = {
  readonly status: 'healthy';
  readonly timestamp: number;
  readonly service: string;
  readonly version: string;
};

export type TelegramHealthStatus = {
  readonly status: ComponentStatus;
  readonly telegram_connected: boolean;
  readonly timestamp: number;
  readonly error?: string;
};

export type ServiceInfo = {
  readonly service: string;
  readonly version: string;
  readonly status: 'running';
  readonly timestamp: number;
  readonly docs_url: string | null;
};
