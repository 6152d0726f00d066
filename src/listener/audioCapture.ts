/**
 * Audio Capture Service
 * Captures microphone audio using node-record-lpcm16 (SoX under the hood)
 * and cuts it into fixed-duration frames
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { record } from 'node-record-lpcm16';
import { DeviceError } from '../errors';
import type { AudioFrame, FrameSource } from './types';

export interface AudioCaptureEvents {
  frame: (frame: AudioFrame) => void;
  error: (error: Error) => void;
  started: () => void;
  stopped: () => void;
}

export type RecorderInstance = {
  stream: () => NodeJS.ReadableStream;
  stop: () => void;
};

export type RecorderOptions = {
  sampleRate: number;
  channels: number;
  device?: string;
};

export type RecorderFactory = (options: RecorderOptions) => RecorderInstance;

export const soxRecorder: RecorderFactory = (options) =>
  record({
    sampleRate: options.sampleRate,
    channels: options.channels,
    threshold: 0,
    // Only the sox recorder applies `device` (as AUDIODEV)
    recorder: 'sox',
    audioType: 'raw',
    ...(options.device ? { device: options.device } : {}),
  });

export type AudioCaptureOptions = {
  sampleRate: number;
  bufferSeconds: number;
  device?: string;
  recorder?: RecorderFactory;
};

type FrameWaiter = {
  resolve: (frame: AudioFrame) => void;
  reject: (error: Error) => void;
};

const BYTES_PER_SAMPLE = 2; // 16-bit mono

function abortError(): Error {
  const error = new Error('Audio capture aborted');
  error.name = 'AbortError';
  return error;
}

export class AudioCapture extends EventEmitter implements FrameSource {
  private recorder: RecorderInstance | null = null;
  private audioStream: NodeJS.ReadableStream | null = null;
  private isCapturing = false;
  private readonly sampleRate: number;
  private readonly bufferSeconds: number;
  private readonly device?: string;
  private readonly createRecorder: RecorderFactory;
  private readonly frameBytes: number;

  private chunks: Buffer[] = [];
  private bufferedBytes = 0;
  private waiter: FrameWaiter | null = null;
  private failure: DeviceError | null = null;
  private chunkCount = 0;
  private lastLogTime = 0;

  constructor(options: AudioCaptureOptions) {
    super();
    this.sampleRate = options.sampleRate;
    this.bufferSeconds = options.bufferSeconds;
    this.device = options.device;
    this.createRecorder = options.recorder ?? soxRecorder;
    this.frameBytes = Math.round(options.bufferSeconds * options.sampleRate) * BYTES_PER_SAMPLE;
  }

  /**
   * Acquire the microphone and start buffering audio
   */
  start(): void {
    if (this.isCapturing) {
      console.warn('[AudioCapture] Already capturing');
      return;
    }

    console.log('[AudioCapture] Starting audio capture via node-record-lpcm16...');
    console.log(`[AudioCapture] Sample rate: ${this.sampleRate}, Frame: ${this.bufferSeconds}s`);

    this.failure = null;
    this.chunks = [];
    this.bufferedBytes = 0;

    try {
      this.recorder = this.createRecorder({
        sampleRate: this.sampleRate,
        channels: 1,
        device: this.device,
      });
      this.audioStream = this.recorder.stream();
    } catch (error) {
      console.error('[AudioCapture] ✗ Failed to start:', error);
      this.recorder = null;
      throw new DeviceError('Failed to open the microphone', error);
    }

    this.audioStream.on('data', (chunk: Buffer) => this.handleChunk(chunk));

    this.audioStream.on('error', (error: unknown) => {
      console.error('[AudioCapture] Stream error:', error);
      this.fail(new DeviceError('Microphone stream failed', error));
    });

    this.audioStream.on('end', () => {
      console.log('[AudioCapture] Stream ended');
      if (this.isCapturing) {
        this.fail(new DeviceError('Microphone stream ended unexpectedly'));
      }
    });

    this.isCapturing = true;
    this.emit('started');
    console.log('[AudioCapture] ✓ Started capturing audio successfully');
  }

  /**
   * Wait for the next complete frame
   */
  nextFrame(signal?: AbortSignal): Promise<AudioFrame> {
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (!this.isCapturing) {
      return Promise.reject(new DeviceError('Audio capture is not running'));
    }
    if (this.waiter) {
      return Promise.reject(new Error('A frame is already being awaited'));
    }

    return new Promise<AudioFrame>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(abortError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiter = {
        resolve: (frame) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(frame);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      this.deliver();
    });
  }

  /**
   * Lazy, endless sequence of frames
   */
  async *frames(signal?: AbortSignal): AsyncGenerator<AudioFrame> {
    while (!signal?.aborted) {
      yield await this.nextFrame(signal);
    }
  }

  /**
   * Release the microphone
   */
  stop(): void {
    if (!this.isCapturing) {
      return;
    }
    this.isCapturing = false;

    if (this.audioStream) {
      this.audioStream.removeAllListeners();
      this.audioStream = null;
    }

    try {
      this.recorder?.stop();
    } catch (error) {
      console.error('[AudioCapture] Error stopping:', error);
    }
    this.recorder = null;
    this.chunks = [];
    this.bufferedBytes = 0;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(abortError());
    }

    this.emit('stopped');
    console.log('[AudioCapture] Stopped capturing audio');
  }

  get capturing(): boolean {
    return this.isCapturing;
  }

  private handleChunk(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.bufferedBytes += chunk.length;

    this.chunkCount++;
    const now = Date.now();
    if (now - this.lastLogTime > 30000) {
      console.log(`[AudioCapture] ✓ Received ${this.chunkCount} chunks`);
      this.lastLogTime = now;
      this.chunkCount = 0;
    }

    if (this.waiter) {
      this.deliver();
    } else {
      this.trimBacklog();
    }
  }

  private deliver(): void {
    if (!this.waiter || this.bufferedBytes < this.frameBytes) {
      return;
    }

    const all = Buffer.concat(this.chunks, this.bufferedBytes);
    const samples = Buffer.from(all.subarray(0, this.frameBytes));
    const rest = all.subarray(this.frameBytes);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.bufferedBytes = rest.length;

    const frame: AudioFrame = {
      samples,
      sampleRate: this.sampleRate,
      durationSeconds: this.bufferSeconds,
    };

    const waiter = this.waiter;
    this.waiter = null;
    this.emit('frame', frame);
    waiter.resolve(frame);
  }

  // Nobody is waiting: keep only the most recent frame's worth of audio
  private trimBacklog(): void {
    if (this.bufferedBytes <= this.frameBytes) {
      return;
    }
    const all = Buffer.concat(this.chunks, this.bufferedBytes);
    const recent = all.subarray(all.length - this.frameBytes);
    this.chunks = [recent];
    this.bufferedBytes = recent.length;
  }

  private fail(error: DeviceError): void {
    this.failure = error;
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(error);
    }
  }
}

/**
 * Check if SoX is installed
 */
export async function checkSoxInstalled(): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn('which', ['sox']);
    child.on('close', (code) => {
      resolve(code === 0);
    });
    child.on('error', () => {
      resolve(false);
    });
  });
}
