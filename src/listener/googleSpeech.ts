/**
 * Google Cloud Speech-to-Text Transcriber
 * Sends one captured frame per request using synchronous recognition
 *
 * Based on: https://cloud.google.com/speech-to-text/docs/sync-recognize
 */

import { SpeechClient, protos } from '@google-cloud/speech';
import { TranscriptionError } from '../errors';
import type { AudioFrame, Transcriber } from './types';

type IRecognitionConfig = protos.google.cloud.speech.v1.IRecognitionConfig;
type IRecognizeRequest = protos.google.cloud.speech.v1.IRecognizeRequest;
type IRecognizeResponse = protos.google.cloud.speech.v1.IRecognizeResponse;

export interface GoogleSpeechConfig {
  languageCode: string;
  // Phrases boosted in recognition, usually the configured keywords
  phrases: string[];
  boost: number;
  timeoutMs: number;
  apiKey?: string;
}

export const DEFAULT_GOOGLE_SPEECH_CONFIG: GoogleSpeechConfig = {
  languageCode: 'en-US',
  phrases: [],
  boost: 15,
  timeoutMs: 30000,
};

// The slice of SpeechClient used here
export interface RecognizeClient {
  recognize(request: IRecognizeRequest, options?: { timeout?: number }): Promise<[IRecognizeResponse, ...unknown[]]>;
  close(): Promise<void>;
}

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('Transcription aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function transcriptFromResponse(response: IRecognizeResponse): string {
  const parts: string[] = [];
  for (const result of response.results ?? []) {
    const transcript = result.alternatives?.[0]?.transcript?.trim();
    if (transcript) {
      parts.push(transcript);
    }
  }
  return parts.join(' ').trim();
}

export class GoogleSpeechTranscriber implements Transcriber {
  private client: RecognizeClient | null;
  private readonly config: GoogleSpeechConfig;

  constructor(config: Partial<GoogleSpeechConfig> = {}, client?: RecognizeClient) {
    this.config = { ...DEFAULT_GOOGLE_SPEECH_CONFIG, ...config };
    this.client = client ?? null;
  }

  initialize(): void {
    if (this.client) return;

    console.log('[GoogleSpeech] Initializing...');
    const apiKey = this.config.apiKey;
    if (apiKey) {
      this.client = new SpeechClient({ apiKey });
      console.log('[GoogleSpeech] ✓ Initialized with API key');
    } else {
      this.client = new SpeechClient();
      console.log('[GoogleSpeech] ✓ Initialized with default credentials');
    }
  }

  async transcribe(frame: AudioFrame, signal?: AbortSignal): Promise<string> {
    if (!this.client) {
      throw new TranscriptionError(new Error('GoogleSpeechTranscriber not initialized. Call initialize() first.'));
    }
    if (signal?.aborted) {
      throw new TranscriptionError(new Error('Transcription aborted'));
    }

    const recognitionConfig: IRecognitionConfig = {
      encoding: protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding.LINEAR16,
      sampleRateHertz: frame.sampleRate,
      languageCode: this.config.languageCode,
      enableAutomaticPunctuation: true,
      speechContexts:
        this.config.phrases.length > 0 ? [{ phrases: this.config.phrases, boost: this.config.boost }] : undefined,
    };

    try {
      const [response] = await abortable(
        this.client.recognize(
          {
            config: recognitionConfig,
            audio: { content: frame.samples.toString('base64') },
          },
          { timeout: this.config.timeoutMs }
        ),
        signal
      );
      return transcriptFromResponse(response);
    } catch (error) {
      throw new TranscriptionError(error);
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
    }
  }
}
