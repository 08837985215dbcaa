import { describe, expect, it, vi } from 'vitest';
import { GenerationError } from '../../../src/journal/generation/errors.js';
import {
  OpenAIImageService,
  type ImageEditRequest,
} from '../../../src/journal/generation/imageGenerationService.js';

const request: ImageEditRequest = {
  image: new Uint8Array([137, 80, 78, 71]),
  prompt: 'Make it cute.',
  size: '1024x1024',
};

const jsonResponse = (body: unknown, status = 200): Response => {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
};

const createService = (fetchImpl: typeof fetch) => {
  return new OpenAIImageService({
    endpoint: 'http://images.test/v1/images/edits',
    fetch: fetchImpl,
  });
};

const captureError = async (promise: Promise<unknown>): Promise<GenerationError> => {
  try {
    await promise;
  } catch (error: unknown) {
    if (error instanceof GenerationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the request to fail');
};

describe('OpenAIImageService', () => {
  it('multipart/form-data で画像と指示を送り、base64 の画像を返す', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ data: [{ b64_json: Buffer.from([1, 2, 3]).toString('base64') }] }),
    );

    const result = await createService(fetchMock).editImage(request, { apiKey: 'test-secret' });

    expect(result).toEqual(new Uint8Array([1, 2, 3]));
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://images.test/v1/images/edits');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret' });

    const body = init?.body;
    if (!(body instanceof FormData)) {
      throw new Error('expected a FormData body');
    }
    expect(body.get('model')).toBe('gpt-image-1.5');
    expect(body.get('prompt')).toBe('Make it cute.');
    expect(body.get('size')).toBe('1024x1024');
    expect(body.get('output_format')).toBe('png');
    expect(body.get('image')).toBeInstanceOf(Blob);
    expect(body.get('mask')).toBeNull();
  });

  it('API のエラーメッセージを serviceError としてそのまま伝える', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ error: { message: 'Billing hard limit reached.' } }, 400),
    );

    const error = await captureError(
      createService(fetchMock).editImage(request, { apiKey: 'test-secret' }),
    );

    expect(error.kind).toBe('serviceError');
    expect(error.message).toBe('Billing hard limit reached.');
  });

  it('エラー本文が読めない場合はステータスコードを伝える', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('bad gateway', { status: 502 }));

    const error = await captureError(
      createService(fetchMock).editImage(request, { apiKey: 'test-secret' }),
    );

    expect(error.kind).toBe('serviceError');
    expect(error.message).toBe('Image API failed with status 502.');
  });

  it('通信に失敗したら transportError', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await captureError(
      createService(fetchMock).editImage(request, { apiKey: 'test-secret' }),
    );

    expect(error.kind).toBe('transportError');
    expect(error.message).toBe('Could not reach the image API.');
  });

  it('画像データが含まれない応答は missingImage', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ data: [] }));

    const error = await captureError(
      createService(fetchMock).editImage(request, { apiKey: 'test-secret' }),
    );

    expect(error.kind).toBe('missingImage');
  });

  it('想定外の形の応答は serviceError', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ images: 'nope' }));

    const error = await captureError(
      createService(fetchMock).editImage(request, { apiKey: 'test-secret' }),
    );

    expect(error.kind).toBe('serviceError');
    expect(error.message).toBe('Unexpected response from the image API.');
  });
});
