/**
 * SMS gateway entry point
 */

import { loadEnvFile, loadServerConfig, loadTwilioConfig } from './config';
import { describeError } from './errors';
import { createSmsApp, startSmsServer } from './sms/server';
import { TwilioSmsSender } from './sms/twilioSender';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadServerConfig();

  if (!config.apiToken) {
    console.warn('[Main] ⚠️ API_TOKEN is not set, every request will be refused');
  }

  const app = createSmsApp({
    apiToken: config.apiToken,
    resolveSender: () => new TwilioSmsSender(loadTwilioConfig()),
  });

  const server = await startSmsServer(app, config.port, config.host);

  const shutdown = () => {
    console.log('[Main] Shutting down SMS API...');
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[Main] ✗ Failed to start SMS API:', describeError(error));
  process.exit(1);
});
