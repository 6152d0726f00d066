/**
 * Keyword Listener Types
 */

export type AudioFrame = {
  // 16-bit signed little-endian PCM, mono
  samples: Buffer;
  sampleRate: number;
  durationSeconds: number;
};

export type NotificationRequest = {
  to: string;
  message: string;
};

export type ListenerStatus =
  | 'idle'           // Between cycles
  | 'capturing'      // Waiting for the microphone buffer to fill
  | 'transcribing'   // Frame submitted to the transcriber
  | 'matching'       // Scanning the transcript for keywords
  | 'cooldown_check' // Keyword found, consulting the cooldown gate
  | 'notifying';     // Notification request in flight

export type CycleOutcome =
  | 'silent'
  | 'empty'
  | 'transcription_failed'
  | 'no_match'
  | 'suppressed'
  | 'notified'
  | 'notify_failed';

export interface Transcriber {
  transcribe(frame: AudioFrame, signal?: AbortSignal): Promise<string>;
  close?(): Promise<void>;
}

export interface Notifier {
  notify(request: NotificationRequest, signal?: AbortSignal): Promise<string>;
}

export interface FrameSource {
  start(): void;
  nextFrame(signal?: AbortSignal): Promise<AudioFrame>;
  stop(): void;
}

export type ListenerConfig = {
  // Keyword phrases, matched case-insensitively
  keywords: string[];
  // Duration of one captured frame (seconds)
  bufferSeconds: number;
  sampleRateHertz: number;
  // Minimum time between two notifications (seconds)
  cooldownSeconds: number;
  // RMS level below which a frame is skipped (0-1)
  silenceThreshold: number;
  smsApiBase: string;
  apiToken: string;
  toNumber: string;
  // Fixed notification body; the transcript is quoted when unset
  message?: string;
  languageCode: string;
  googleApiKey?: string;
  printTranscripts: boolean;
  requestTimeoutSeconds: number;
  device?: string;
};

export const DEFAULT_CONFIG = {
  keywords: ['chicken nugget', 'chicken nuggets'],
  bufferSeconds: 4,
  sampleRateHertz: 16000,
  cooldownSeconds: 15,
  silenceThreshold: 0.001,
  smsApiBase: 'http://localhost:8000',
  languageCode: 'en-US',
  printTranscripts: true,
  requestTimeoutSeconds: 30,
} satisfies Partial<ListenerConfig>;
