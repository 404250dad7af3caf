import { randomUUID } from 'node:crypto';

import type { DeliveryOutcome, EmailMessage, MessageSender, WhatsAppMessage } from '../contracts/send';

const PREVIEW_LENGTH = 50;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Stand-in used when no provider is wired: logs the message it would have
 * sent and reports success.
 */
export class ConsoleMessageSender implements MessageSender {
  async sendEmail(message: EmailMessage): Promise<DeliveryOutcome> {
    const messageId = randomUUID();
    console.log(`[email] ${messageId} to=${message.to} subject="${preview(message.subject)}"`);
    return { ok: true, messageId };
  }

  async sendWhatsApp(message: WhatsAppMessage): Promise<DeliveryOutcome> {
    const messageId = randomUUID();
    console.log(`[whatsapp] ${messageId} to=${message.to} message="${preview(message.message)}"`);
    return { ok: true, messageId };
  }
}
