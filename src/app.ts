import express, { type NextFunction, type Request, type Response } from 'express';

import type {
  BulkSendResponse,
  BulkSummary,
  Channel,
  MessageSender,
  SendErrorResponse,
  SendFailure,
  SendResponse,
  TransmissionErrorKind,
} from './contracts/send';
import { dispatchBulkSend, isBulkPayload } from './dispatch/bulk';
import { dispatchSend, toRawPayload } from './dispatch/dispatcher';
import { checkHealth, SERVICE_NAME } from './health';

const DEFAULT_JSON_BODY_LIMIT = '1mb';

export interface AppOptions {
  sender: MessageSender;
  jsonBodyLimit?: string;
}

type ClientError = Exclude<SendFailure['error'], 'TransmissionFailed'>;

const FAILURE_STATUS: Record<ClientError | TransmissionErrorKind, number> = {
  UnknownChannel: 400,
  InvalidPayload: 400,
  ProviderUnavailable: 503,
  Rejected: 502,
};

function toErrorResponse(failure: SendFailure): { status: number; body: SendErrorResponse } {
  switch (failure.error) {
    case 'UnknownChannel':
      return {
        status: FAILURE_STATUS.UnknownChannel,
        body: { error: 'UnknownChannel', value: failure.value, message: failure.reason },
      };
    case 'InvalidPayload':
      return {
        status: FAILURE_STATUS.InvalidPayload,
        body: { error: 'InvalidPayload', fields: failure.fields, message: failure.reason },
      };
    case 'TransmissionFailed':
      return {
        status: FAILURE_STATUS[failure.kind],
        body: { error: failure.kind, message: failure.reason },
      };
  }
}

function bulkStatus(summary: BulkSummary): BulkSendResponse['status'] {
  if (summary.failed === 0) return 'sent';
  return summary.success === 0 ? 'failed' : 'partial';
}

function bodyParserErrorType(error: unknown): string | null {
  if (!error || typeof error !== 'object' || !('type' in error)) return null;
  return typeof error.type === 'string' ? error.type : null;
}

export function createApp(options: AppOptions) {
  const { sender } = options;
  const app = express();

  app.use(express.json({ limit: options.jsonBodyLimit ?? DEFAULT_JSON_BODY_LIMIT }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ ...checkHealth(), service: SERVICE_NAME });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json(checkHealth());
  });

  const handleSend = (forcedChannel?: Channel) => async (req: Request, res: Response) => {
    const raw = toRawPayload(req.body);
    if (forcedChannel) {
      raw.channel = forcedChannel;
    }

    try {
      if (isBulkPayload(raw)) {
        const bulk = await dispatchBulkSend(raw, sender);
        if (!bulk.ok) {
          const { status, body } = toErrorResponse(bulk);
          res.status(status).json(body);
          return;
        }
        console.log(
          `Bulk send via ${bulk.channel}: ${bulk.summary.success}/${bulk.summary.total} sent, ${bulk.summary.failed} failed`,
        );
        const response: BulkSendResponse = {
          status: bulkStatus(bulk.summary),
          channel: bulk.channel,
          summary: bulk.summary,
          previews: bulk.previews,
        };
        res.json(response);
        return;
      }

      const result = await dispatchSend(raw, sender);
      if (!result.ok) {
        const { status, body } = toErrorResponse(result);
        if (result.error === 'TransmissionFailed') {
          console.warn(`Send via ${result.channel} failed (${result.kind}): ${result.reason}`);
        }
        res.status(status).json(body);
        return;
      }
      const response: SendResponse = { status: 'sent', channel: result.channel, messageId: result.messageId };
      res.json(response);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Send handler error: ${message}`);
      res.status(500).json({ error: 'InternalError' });
    }
  };

  app.post('/send', handleSend());
  app.post('/send-email', handleSend('email'));
  app.post('/send-whatsapp', handleSend('whatsapp'));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    const type = bodyParserErrorType(error);
    if (type === 'entity.parse.failed') {
      res.status(400).json({ error: 'InvalidJson' });
      return;
    }
    if (type === 'entity.too.large') {
      res.status(413).json({ error: 'PayloadTooLarge' });
      return;
    }
    next(error);
  });

  return app;
}
