import assert from 'node:assert/strict';
import test from 'node:test';

import { ConsoleMessageSender } from './console';

test('ConsoleMessageSender logs an email and reports success', async (t) => {
  const log = t.mock.method(console, 'log', () => {});
  const sender = new ConsoleMessageSender();
  const outcome = await sender.sendEmail({ channel: 'email', to: 'a@example.com', subject: 'Olá', body: 'Corpo' });

  assert.equal(outcome.ok, true);
  const messageId = outcome.ok ? outcome.messageId : undefined;
  assert.equal(typeof messageId, 'string');
  assert.deepEqual(log.mock.calls[0]?.arguments, [`[email] ${messageId} to=a@example.com subject="Olá"`]);
});

test('ConsoleMessageSender shortens long whatsapp messages in the log', async (t) => {
  const log = t.mock.method(console, 'log', () => {});
  const sender = new ConsoleMessageSender();
  const outcome = await sender.sendWhatsApp({ channel: 'whatsapp', to: '+551199999999', message: 'a'.repeat(60) });

  const messageId = outcome.ok ? outcome.messageId : undefined;
  assert.deepEqual(log.mock.calls[0]?.arguments, [
    `[whatsapp] ${messageId} to=+551199999999 message="${'a'.repeat(50)}..."`,
  ]);
});
