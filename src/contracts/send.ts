export const CHANNELS = ['email', 'whatsapp'] as const;

export type Channel = (typeof CHANNELS)[number];

export interface EmailMessage {
  channel: 'email';
  to: string;
  subject: string;
  body: string;
}

export interface WhatsAppMessage {
  channel: 'whatsapp';
  to: string; // +5511999999999, no format enforced
  message: string;
}

export type SendRequest = EmailMessage | WhatsAppMessage;

// Body as received over the wire, before the channel is known.
export type RawPayload = Record<string, unknown>;

export type TransmissionErrorKind = 'ProviderUnavailable' | 'Rejected';

export type DeliveryOutcome =
  | { ok: true; messageId?: string }
  | { ok: false; kind: TransmissionErrorKind; reason?: string };

/**
 * Outbound transmission, one operation per channel. Provided by the host
 * application; the dispatcher only calls it.
 */
export interface MessageSender {
  sendEmail(message: EmailMessage): Promise<DeliveryOutcome>;
  sendWhatsApp(message: WhatsAppMessage): Promise<DeliveryOutcome>;
}

export type SendFailure =
  | { ok: false; error: 'UnknownChannel'; value: unknown; reason: string }
  | { ok: false; error: 'InvalidPayload'; channel: Channel; fields: string[]; reason: string }
  | { ok: false; error: 'TransmissionFailed'; channel: Channel; kind: TransmissionErrorKind; reason: string };

export type SendResult = { ok: true; channel: Channel; messageId?: string } | SendFailure;

export interface SendResponse {
  status: 'sent';
  channel: Channel;
  messageId?: string;
}

export type SendErrorResponse =
  | { error: 'UnknownChannel'; value: unknown; message: string }
  | { error: 'InvalidPayload'; fields: string[]; message: string }
  | { error: TransmissionErrorKind; message: string };

export interface HealthStatus {
  status: 'ok';
}

export type BulkRowStatus = 'sent' | 'failed' | 'invalid';

export interface BulkPreview {
  index: number;
  recipient: string;
  subject?: string;
  message: string;
  status: BulkRowStatus;
  messageId?: string;
  error?: string;
}

export interface BulkSummary {
  total: number;
  success: number;
  failed: number;
}

export type BulkSendResult =
  | { ok: true; channel: Channel; summary: BulkSummary; previews: BulkPreview[] }
  | Exclude<SendFailure, { error: 'TransmissionFailed' }>;

export interface BulkSendResponse {
  status: 'sent' | 'partial' | 'failed';
  channel: Channel;
  summary: BulkSummary;
  previews: BulkPreview[];
}
