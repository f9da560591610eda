import type { FastifyBaseLogger } from 'fastify';
import type { AppConfig } from './config.js';
import type { AlertStateStore } from './services/alert-state-store.js';
import type { DispatchGateway } from './services/dispatch-gateway.js';
import type { QuotaTracker } from './services/quota-tracker.js';
import type { ReadingHistory } from './services/reading-history.js';
import type { RecipientDirectory } from './services/recipient-directory.js';
import type { ReplyTokenStore } from './services/reply-token-store.js';
import type { TelemetryIngest } from './services/telemetry-ingest.js';

declare module 'fastify' {
  interface FastifyInstance {
    appConfig: AppConfig;
    alertStates: AlertStateStore;
    quota: QuotaTracker;
    replyTokens: ReplyTokenStore;
    recipients: RecipientDirectory;
    gateway: DispatchGateway;
    history: ReadingHistory;
    telemetry: TelemetryIngest;
  }

  interface FastifyRequest {
    /** Raw JSON body, kept by routes that verify a body signature */
    rawBody?: string;
  }
}

export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export type Clock = () => Date;
