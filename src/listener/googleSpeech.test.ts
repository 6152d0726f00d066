import { describe, it, expect, vi } from 'vitest';
import { protos } from '@google-cloud/speech';
import { TranscriptionError } from '../errors';
import { GoogleSpeechTranscriber, RecognizeClient, transcriptFromResponse } from './googleSpeech';
import type { AudioFrame } from './types';

const frame: AudioFrame = {
  samples: Buffer.from([1, 0, 2, 0]),
  sampleRate: 16000,
  durationSeconds: 4,
};

function fakeClient(recognize: RecognizeClient['recognize']): RecognizeClient {
  return { recognize, close: vi.fn(async () => {}) };
}

describe('transcriptFromResponse', () => {
  it('should join the top alternative of every result', () => {
    expect(
      transcriptFromResponse({
        results: [
          { alternatives: [{ transcript: 'I want a ' }, { transcript: 'eye want a' }] },
          { alternatives: [{ transcript: 'chicken nugget' }] },
        ],
      })
    ).toBe('I want a chicken nugget');
  });

  it('should return an empty string when nothing was recognized', () => {
    expect(transcriptFromResponse({})).toBe('');
    expect(transcriptFromResponse({ results: [{ alternatives: [] }] })).toBe('');
  });
});

describe('GoogleSpeechTranscriber', () => {
  it('should send the frame as base64 LINEAR16 with boosted keywords', async () => {
    const recognize = vi.fn<RecognizeClient['recognize']>(async () => [
      { results: [{ alternatives: [{ transcript: 'chicken nugget' }] }] },
    ]);
    const transcriber = new GoogleSpeechTranscriber(
      { languageCode: 'en-GB', phrases: ['chicken nugget'], timeoutMs: 5000 },
      fakeClient(recognize)
    );

    await expect(transcriber.transcribe(frame)).resolves.toBe('chicken nugget');
    expect(recognize).toHaveBeenCalledWith(
      {
        config: {
          encoding: protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding.LINEAR16,
          sampleRateHertz: 16000,
          languageCode: 'en-GB',
          enableAutomaticPunctuation: true,
          speechContexts: [{ phrases: ['chicken nugget'], boost: 15 }],
        },
        audio: { content: 'AQACAA==' },
      },
      { timeout: 5000 }
    );
  });

  it('should wrap client failures in TranscriptionError', async () => {
    const transcriber = new GoogleSpeechTranscriber(
      {},
      fakeClient(async () => {
        throw new Error('8 RESOURCE_EXHAUSTED: Quota exceeded');
      })
    );

    const result = transcriber.transcribe(frame);
    await expect(result).rejects.toBeInstanceOf(TranscriptionError);
    await expect(result).rejects.toThrow('Transcription failed: 8 RESOURCE_EXHAUSTED: Quota exceeded');
  });

  it('should give up on a pending request when the signal aborts', async () => {
    const transcriber = new GoogleSpeechTranscriber({}, fakeClient(() => new Promise<never>(() => {})));
    const controller = new AbortController();

    const result = transcriber.transcribe(frame, controller.signal);
    controller.abort();

    await expect(result).rejects.toThrow('Transcription failed: Transcription aborted');
  });

  it('should refuse to transcribe before initialization', async () => {
    const transcriber = new GoogleSpeechTranscriber();
    await expect(transcriber.transcribe(frame)).rejects.toThrow('not initialized');
  });

  it('should close the client once', async () => {
    const client = fakeClient(async () => [{}]);
    const transcriber = new GoogleSpeechTranscriber({}, client);

    await transcriber.close();
    await transcriber.close();
    expect(client.close).toHaveBeenCalledTimes(1);
  });
});
