/**
 * Keyword listener entry point
 * Runs until SIGINT/SIGTERM; exits 1 when startup fails.
 */

import { loadEnvFile, loadListenerConfig } from './config';
import { AppError, ConfigurationError, DeviceError, describeError } from './errors';
import { checkSoxInstalled, createKeywordListener } from './listener';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadListenerConfig();

  console.log('[Main] ========================================');
  console.log('[Main] Mic keyword listener starting');
  console.log('[Main] ========================================');
  console.log(`[Main] Keywords: ${config.keywords.join(', ')}`);
  console.log(
    `[Main] Buffer: ${config.bufferSeconds}s, Sample rate: ${config.sampleRateHertz} Hz, Cooldown: ${config.cooldownSeconds}s`
  );

  console.log('[Main] Checking for SoX installation...');
  if (!(await checkSoxInstalled())) {
    throw new DeviceError(
      'SoX is not installed. Please install it:\n' +
        '  macOS: brew install sox\n' +
        '  Ubuntu: sudo apt-get install sox\n' +
        '  Windows: Download from https://sox.sourceforge.net/'
    );
  }
  console.log('[Main] ✓ SoX is installed');

  const { listener, transcriber } = createKeywordListener(config);
  transcriber.initialize();

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`\n[Main] Received ${signal}, stopping listener.`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  console.log('[Main] Press Ctrl+C to stop.');
  try {
    await listener.run(controller.signal);
  } finally {
    await listener.destroy();
  }
}

main().then(
  () => {
    process.exit(0);
  },
  (error: unknown) => {
    if (error instanceof ConfigurationError || error instanceof DeviceError) {
      console.error(`[Main] ✗ ${error.message}`);
    } else if (error instanceof AppError) {
      console.error(`[Main] ✗ ${error.code}: ${error.message}`);
    } else {
      console.error('[Main] ✗ Unexpected failure:', describeError(error));
    }
    process.exit(1);
  }
);
