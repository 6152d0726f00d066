/**
 * Keyword Listener
 * Capture → transcribe → match → notify, one cycle at a time, until aborted.
 * Per-cycle failures are logged and the next cycle runs; only a lost
 * microphone ends the loop.
 */

import { EventEmitter } from 'events';
import { DeviceError, NotificationError, TranscriptionError, describeError } from '../errors';
import { AudioCapture } from './audioCapture';
import { CooldownGate } from './cooldownGate';
import { GoogleSpeechTranscriber } from './googleSpeech';
import { KeywordMatcher } from './keywordMatcher';
import { isSilent } from './silence';
import { HttpNotifier } from './smsNotifier';
import type {
  CycleOutcome,
  FrameSource,
  ListenerConfig,
  ListenerStatus,
  NotificationRequest,
  Notifier,
  Transcriber,
} from './types';

export interface KeywordListenerEvents {
  statusChange: (status: ListenerStatus) => void;
  transcript: (data: { text: string }) => void;
  keywordDetected: (data: { keyword: string; transcript: string }) => void;
  suppressed: (data: { keyword: string; transcript: string }) => void;
  notificationSent: (data: { sid: string; request: NotificationRequest }) => void;
  error: (error: Error) => void;
}

export type KeywordListenerContext = {
  capture: FrameSource;
  transcriber: Transcriber;
  notifier: Notifier;
  matcher: KeywordMatcher;
  gate: CooldownGate;
  toNumber: string;
  message?: string;
  silenceThreshold: number;
  printTranscripts: boolean;
  errorBackoffMs?: number;
  now?: () => number;
};

export const ERROR_BACKOFF_MS = 1000;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export function notificationBody(transcript: string, message?: string): string {
  return message ?? `Keyword detected: '${transcript}'`;
}

export class KeywordListener extends EventEmitter {
  private status: ListenerStatus = 'idle';
  private isRunning = false;
  private readonly now: () => number;
  private readonly errorBackoffMs: number;

  constructor(private readonly context: KeywordListenerContext) {
    super();
    this.now = context.now ?? Date.now;
    this.errorBackoffMs = context.errorBackoffMs ?? ERROR_BACKOFF_MS;
  }

  /**
   * Run one capture → notify cycle
   */
  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const { capture, transcriber, notifier, matcher, gate } = this.context;

    try {
      this.setStatus('capturing');
      const frame = await capture.nextFrame(signal);

      // Skip near-silence to save API calls
      if (isSilent(frame, this.context.silenceThreshold)) {
        return 'silent';
      }

      this.setStatus('transcribing');
      let text: string;
      try {
        text = (await transcriber.transcribe(frame, signal)).trim();
      } catch (error) {
        // Aborted mid-request: run() ends quietly
        if (!(error instanceof TranscriptionError) || signal?.aborted) throw error;
        console.error('[KeywordListener] ✗ Transcription error:', error.message);
        this.reportError(error);
        return 'transcription_failed';
      }

      if (!text) {
        return 'empty';
      }

      if (this.context.printTranscripts) {
        console.log(`[KeywordListener] 📝 Transcription: ${text}`);
      }
      this.emit('transcript', { text });

      this.setStatus('matching');
      const keyword = matcher.match(text);
      if (!keyword) {
        return 'no_match';
      }

      console.log(`[KeywordListener] 🎉 Keyword detected: "${keyword}"`);
      this.emit('keywordDetected', { keyword, transcript: text });

      this.setStatus('cooldown_check');
      if (!gate.tryAcquire(this.now())) {
        console.log('[KeywordListener] Within cooldown, detection suppressed');
        this.emit('suppressed', { keyword, transcript: text });
        return 'suppressed';
      }

      this.setStatus('notifying');
      const request: NotificationRequest = {
        to: this.context.toNumber,
        message: notificationBody(text, this.context.message),
      };

      try {
        const sid = await notifier.notify(request, signal);
        console.log(`[KeywordListener] ✓ SMS sent: ${sid}`);
        this.emit('notificationSent', { sid, request });
        return 'notified';
      } catch (error) {
        if (!(error instanceof NotificationError) || signal?.aborted) throw error;
        console.error('[KeywordListener] ✗ Failed to send SMS:', error.message);
        this.reportError(error);
        return 'notify_failed';
      }
    } finally {
      this.setStatus('idle');
    }
  }

  /**
   * Listen until the signal aborts. The microphone is always released.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.isRunning) {
      console.warn('[KeywordListener] Already running');
      return;
    }

    console.log('[KeywordListener] ========================================');
    console.log('[KeywordListener] Starting keyword detection');
    console.log('[KeywordListener] Keywords:', this.context.matcher.phrases.join(', '));
    console.log('[KeywordListener] ========================================');

    this.isRunning = true;

    try {
      this.context.capture.start();
      while (!signal.aborted) {
        try {
          await this.runCycle(signal);
        } catch (error) {
          if (signal.aborted) break;
          if (error instanceof DeviceError) throw error;

          console.error('[KeywordListener] Error:', describeError(error));
          this.reportError(error instanceof Error ? error : new Error(String(error)));
          await sleep(this.errorBackoffMs, signal);
        }
      }
    } finally {
      this.context.capture.stop();
      this.isRunning = false;
      this.setStatus('idle');
      console.log('[KeywordListener] Stopped listening');
    }
  }

  async destroy(): Promise<void> {
    this.context.capture.stop();
    await this.context.transcriber.close?.();
  }

  getStatus(): ListenerStatus {
    return this.status;
  }

  get running(): boolean {
    return this.isRunning;
  }

  private setStatus(status: ListenerStatus): void {
    if (this.status !== status) {
      this.status = status;
      this.emit('statusChange', status);
    }
  }

  private reportError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}

/**
 * Wire the production components from configuration
 */
export function createKeywordListener(config: ListenerConfig): {
  listener: KeywordListener;
  transcriber: GoogleSpeechTranscriber;
} {
  const timeoutMs = config.requestTimeoutSeconds * 1000;

  const transcriber = new GoogleSpeechTranscriber({
    languageCode: config.languageCode,
    phrases: config.keywords,
    timeoutMs,
    apiKey: config.googleApiKey,
  });

  const listener = new KeywordListener({
    capture: new AudioCapture({
      sampleRate: config.sampleRateHertz,
      bufferSeconds: config.bufferSeconds,
      device: config.device,
    }),
    transcriber,
    notifier: new HttpNotifier({
      baseUrl: config.smsApiBase,
      apiToken: config.apiToken,
      timeoutMs,
    }),
    matcher: new KeywordMatcher(config.keywords),
    gate: new CooldownGate(config.cooldownSeconds * 1000),
    toNumber: config.toNumber,
    message: config.message,
    silenceThreshold: config.silenceThreshold,
    printTranscripts: config.printTranscripts,
  });

  return { listener, transcriber };
}
