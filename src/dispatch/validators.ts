import type { EmailMessage, RawPayload, WhatsAppMessage } from '../contracts/send';

const EMAIL_FIELDS = ['to', 'subject', 'body'] as const;
const WHATSAPP_FIELDS = ['to', 'message'] as const;
const EMAIL_DOMAIN_SEPARATOR = '@';

type FieldReader = (value: unknown) => string | null;

export type Validation<T> = { ok: true; value: T } | { ok: false; fields: string[] };

export function readString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function readRecipient(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return readString(String(value));
  }
  return readString(value);
}

// An '@' with a non-empty domain part.
export function looksLikeEmail(address: string): boolean {
  const at = address.lastIndexOf(EMAIL_DOMAIN_SEPARATOR);
  if (at === -1) return false;
  return address.slice(at + 1).trim().length > 0;
}

function collectFields<K extends string>(
  payload: RawPayload,
  names: readonly K[],
  readers: Partial<Record<K, FieldReader>> = {},
): { values: Partial<Record<K, string>>; missing: string[] } {
  const values: Partial<Record<K, string>> = {};
  const missing: string[] = [];
  for (const name of names) {
    const read = readers[name] ?? readString;
    const value = read(payload[name]);
    if (value === null) {
      missing.push(name);
      continue;
    }
    values[name] = value;
  }
  return { values, missing };
}

export function validateEmail(payload: RawPayload): Validation<EmailMessage> {
  const { values, missing } = collectFields(payload, EMAIL_FIELDS);
  if (values.to !== undefined && !looksLikeEmail(values.to)) {
    missing.unshift('to');
  }
  const { to, subject, body } = values;
  if (missing.length > 0 || to === undefined || subject === undefined || body === undefined) {
    return { ok: false, fields: missing };
  }
  return { ok: true, value: { channel: 'email', to, subject, body } };
}

export function validateWhatsApp(payload: RawPayload): Validation<WhatsAppMessage> {
  const { values, missing } = collectFields(payload, WHATSAPP_FIELDS, { to: readRecipient });
  const { to, message } = values;
  if (missing.length > 0 || to === undefined || message === undefined) {
    return { ok: false, fields: missing };
  }
  return { ok: true, value: { channel: 'whatsapp', to, message } };
}
