/**
 * Keyword Listener Module
 *
 * Always-on keyword detection using:
 * - Audio capture via SoX, cut into fixed-duration frames
 * - RMS silence check to reduce API costs
 * - Google Cloud Speech-to-Text for each non-silent frame
 * - Case-insensitive phrase matching
 * - A cooldown gate in front of the SMS gateway
 *
 * Usage:
 * ```
 * import { createKeywordListener, loadListenerConfig } from './listener';
 *
 * const { listener, transcriber } = createKeywordListener(loadListenerConfig());
 * transcriber.initialize();
 *
 * listener.on('notificationSent', ({ sid }) => {
 *   console.log('SMS sent:', sid);
 * });
 *
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 * await listener.run(controller.signal);
 * ```
 */

export * from './types';
export * from './audioCapture';
export * from './silence';
export * from './googleSpeech';
export * from './keywordMatcher';
export * from './cooldownGate';
export * from './smsNotifier';
export * from './keywordListener';
export { loadListenerConfig } from '../config';
