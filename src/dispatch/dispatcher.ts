import {
  CHANNELS,
  type Channel,
  type DeliveryOutcome,
  type MessageSender,
  type RawPayload,
  type SendFailure,
  type SendRequest,
  type SendResult,
} from '../contracts/send';
import { validateEmail, validateWhatsApp } from './validators';

export type ParseResult = { ok: true; request: SendRequest } | Exclude<SendFailure, { error: 'TransmissionFailed' }>;

export function isChannel(value: unknown): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}

export function toRawPayload(body: unknown): RawPayload {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

function describeValue(value: unknown): string {
  if (value === undefined || value === null) return 'missing';
  return typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
}

export function unknownChannel(value: unknown): Extract<SendFailure, { error: 'UnknownChannel' }> {
  return {
    ok: false,
    error: 'UnknownChannel',
    value: value ?? null,
    reason: `Unsupported channel: ${describeValue(value)}`,
  };
}

export function parseSendRequest(raw: RawPayload): ParseResult {
  const channel = raw.channel;
  if (!isChannel(channel)) {
    return unknownChannel(channel);
  }

  const validation = channel === 'email' ? validateEmail(raw) : validateWhatsApp(raw);
  if (!validation.ok) {
    return {
      ok: false,
      error: 'InvalidPayload',
      channel,
      fields: validation.fields,
      reason: `Missing or invalid fields for ${channel}: ${validation.fields.join(', ')}`,
    };
  }
  return { ok: true, request: validation.value };
}

export function transmit(request: SendRequest, sender: MessageSender): Promise<DeliveryOutcome> {
  switch (request.channel) {
    case 'email':
      return sender.sendEmail(request);
    case 'whatsapp':
      return sender.sendWhatsApp(request);
  }
}

export async function dispatchSend(raw: RawPayload, sender: MessageSender): Promise<SendResult> {
  const parsed = parseSendRequest(raw);
  if (!parsed.ok) return parsed;

  const { channel } = parsed.request;
  const outcome = await transmit(parsed.request, sender);
  if (!outcome.ok) {
    return {
      ok: false,
      error: 'TransmissionFailed',
      channel,
      kind: outcome.kind,
      reason: outcome.reason ?? `${channel} provider reported ${outcome.kind}`,
    };
  }
  return { ok: true, channel, messageId: outcome.messageId };
}
