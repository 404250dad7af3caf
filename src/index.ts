import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { SERVICE_NAME } from './health';
import { ConsoleMessageSender } from './senders/console';

dotenv.config();

const config = loadConfig(process.env);
const app = createApp({
  sender: new ConsoleMessageSender(),
  jsonBodyLimit: config.jsonBodyLimit,
});

const server = app.listen(config.port, config.bindHost, () => {
  console.log(`${SERVICE_NAME} listening on ${config.bindHost}:${config.port}`);
});

server.on('error', (error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${SERVICE_NAME} failed to start: ${message}`);
  process.exit(1);
});
