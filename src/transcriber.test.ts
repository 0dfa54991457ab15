import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { MAX_AUDIO_BYTES, OpenAITranscriber } from './transcriber.js';
import { TranscriptionError } from './types/errors.js';
import type { AudioPayload } from './types/media.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const PROVIDER_URL = 'http://provider.test/v1';

function fakeProvider(respond: () => Response) {
  const fetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  const client = new OpenAI({ apiKey: 'test-key', baseURL: PROVIDER_URL, maxRetries: 0, fetch });
  return { fetch, transcriber: new OpenAITranscriber(client, 'whisper-1') };
}

// Never answers provider requests; rejects once the request is aborted
function hangingFetch(input: string | URL | Request, init?: RequestInit): Promise<Response> {
  if (String(input).startsWith('data:')) {
    return Promise.resolve(new Response(''));
  }
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
    });
  });
}

// The SDK may probe FormData support with a data: URL before uploading
function providerCalls(fetch: ReturnType<typeof fakeProvider>['fetch']) {
  return fetch.mock.calls.filter(([input]) => String(input).startsWith(PROVIDER_URL));
}

const audio: AudioPayload = { filename: 'lecture.mp3', format: 'mp3', data: Buffer.from('fake-mp3') };

async function rejection(promise: Promise<unknown>): Promise<TranscriptionError> {
  const error = await promise.then(() => undefined, (err: unknown) => err);
  if (!(error instanceof TranscriptionError)) throw new Error(`expected TranscriptionError, got ${String(error)}`);
  return error;
}

describe('OpenAITranscriber', () => {
  it('uploads the audio and returns the trimmed transcript', async () => {
    const { fetch, transcriber } = fakeProvider(() => jsonResponse({ text: '  Hello and welcome.  ' }));

    const transcript = await transcriber.transcribe(audio);

    expect(transcript).toEqual({ text: 'Hello and welcome.' });
    const calls = providerCalls(fetch);
    expect(calls).toHaveLength(1);
    expect(String(calls[0][0])).toBe('http://provider.test/v1/audio/transcriptions');
    expect(calls[0][1]?.method).toBe('POST');
  });

  it('refuses audio above the provider limit without calling it', async () => {
    const { fetch, transcriber } = fakeProvider(() => jsonResponse({ text: 'unused' }));

    const error = await rejection(transcriber.transcribe({ ...audio, data: Buffer.alloc(MAX_AUDIO_BYTES + 1) }));

    expect(error.code).toBe('AUDIO_TOO_LARGE');
    expect(fetch).not.toHaveBeenCalled();
  });

  it('maps a non-success response to PROVIDER_ERROR with its status', async () => {
    const { transcriber } = fakeProvider(() => jsonResponse({ error: { message: 'upstream failure' } }, 500));

    const error = await rejection(transcriber.transcribe(audio));

    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.status).toBe(500);
  });

  it('treats an empty transcript as a failure', async () => {
    const { transcriber } = fakeProvider(() => jsonResponse({ text: '   ' }));

    const error = await rejection(transcriber.transcribe(audio));

    expect(error.code).toBe('EMPTY_TRANSCRIPT');
  });

  it('reports a request that outlives the provider timeout as TIMEOUT', async () => {
    const client = new OpenAI({ apiKey: 'test-key', baseURL: PROVIDER_URL, maxRetries: 0, timeout: 20, fetch: hangingFetch });

    const error = await rejection(new OpenAITranscriber(client, 'whisper-1').transcribe(audio));

    expect(error.code).toBe('TIMEOUT');
    expect(error.message).toBe('Request to the provider timed out');
  });

  it('reports cancellation', async () => {
    const { transcriber } = fakeProvider(() => jsonResponse({ text: 'unused' }));
    const controller = new AbortController();
    controller.abort();

    const error = await rejection(transcriber.transcribe(audio, { signal: controller.signal }));

    expect(error.code).toBe('CANCELLED');
  });
});
