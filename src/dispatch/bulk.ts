import type {
  BulkPreview,
  BulkSendResult,
  Channel,
  MessageSender,
  RawPayload,
  SendFailure,
  SendRequest,
} from '../contracts/send';
import { isChannel, parseSendRequest, toRawPayload, transmit, unknownChannel } from './dispatcher';
import { readRecipient, readString } from './validators';

const MAX_PREVIEWS = 5;
const PREVIEW_LENGTH = 50;
const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

const TEMPLATE_FIELDS: Record<Channel, readonly string[]> = {
  email: ['subject', 'body'],
  whatsapp: ['message'],
};

type InvalidPayload = Extract<SendFailure, { error: 'InvalidPayload' }>;

export function isBulkPayload(raw: RawPayload): boolean {
  return raw.rows !== undefined;
}

/**
 * Replaces `{Column}` with the row's value for that column. Placeholders
 * naming a column the row lacks are left as written.
 */
export function fillPlaceholders(template: string, row: RawPayload): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder, key: string) => {
    if (!Object.hasOwn(row, key)) return placeholder;
    const value = row[key];
    if (value === undefined || value === null) return '';
    return String(value);
  });
}

function truncate(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

function invalidPayload(channel: Channel, fields: string[], reason?: string): InvalidPayload {
  return {
    ok: false,
    error: 'InvalidPayload',
    channel,
    fields,
    reason: reason ?? `Missing or invalid fields for ${channel}: ${fields.join(', ')}`,
  };
}

function personalize(channel: Channel, template: RawPayload, row: RawPayload, to: string): RawPayload {
  const fill = (field: string) => fillPlaceholders(readString(template[field]) ?? '', row);
  if (channel === 'email') {
    return { channel, to, subject: fill('subject'), body: fill('body') };
  }
  return { channel, to, message: fill('message') };
}

function describe(request: SendRequest): Pick<BulkPreview, 'subject' | 'message'> {
  if (request.channel === 'email') {
    return { subject: request.subject, message: truncate(request.body) };
  }
  return { message: truncate(request.message) };
}

/**
 * Sends one personalized message per row of `rows`, addressed to the value
 * of `contact_column`. Rows without a contact are skipped and not counted.
 */
export async function dispatchBulkSend(raw: RawPayload, sender: MessageSender): Promise<BulkSendResult> {
  const channel = raw.channel;
  if (!isChannel(channel)) {
    return unknownChannel(channel);
  }

  const missing = TEMPLATE_FIELDS[channel].filter((field) => readString(raw[field]) === null);
  const rows = Array.isArray(raw.rows) && raw.rows.length > 0 ? raw.rows : null;
  if (!rows) missing.push('rows');
  const contactColumn = readString(raw.contact_column);
  if (contactColumn === null) missing.push('contact_column');
  if (!rows || contactColumn === null || missing.length > 0) {
    return invalidPayload(channel, missing);
  }

  const summary = { total: 0, success: 0, failed: 0 };
  const previews: BulkPreview[] = [];
  const record = (preview: BulkPreview) => {
    if (preview.status === 'sent') {
      summary.success += 1;
    } else {
      summary.failed += 1;
    }
    if (previews.length < MAX_PREVIEWS) previews.push(preview);
  };

  for (const [index, entry] of rows.entries()) {
    const row = toRawPayload(entry);
    const recipient = readRecipient(row[contactColumn]);
    if (recipient === null) continue;
    summary.total += 1;

    const personalized = personalize(channel, raw, row, recipient);
    const parsed = parseSendRequest(personalized);
    if (!parsed.ok) {
      const message = truncate(readString(personalized.body ?? personalized.message) ?? '');
      record({ index, recipient, message, status: 'invalid', error: parsed.reason });
      continue;
    }

    const outcome = await transmit(parsed.request, sender);
    const base = { index, recipient: parsed.request.to, ...describe(parsed.request) };
    if (outcome.ok) {
      record({ ...base, status: 'sent', messageId: outcome.messageId });
    } else {
      record({ ...base, status: 'failed', error: outcome.reason ?? outcome.kind });
    }
  }

  if (summary.total === 0) {
    return invalidPayload(channel, ['rows'], `No recipients found in column "${contactColumn}"`);
  }
  return { ok: true, channel, summary, previews };
}
