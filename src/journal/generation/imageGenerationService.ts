import { z } from 'zod';
import { generationError } from './errors.js';

export const IMAGE_SIZES = ['1024x1024', '1536x1024', '1024x1536', 'auto'] as const;

export type ImageSize = (typeof IMAGE_SIZES)[number];

export interface ImageEditRequest {
  readonly image: Uint8Array;
  readonly mask?: Uint8Array | null | undefined;
  readonly prompt: string;
  readonly size: ImageSize;
}

export interface ImageEditCallOptions {
  readonly apiKey: string;
  readonly signal?: AbortSignal | undefined;
}

/**
 * 画像と指示文を受け取り、編集後の画像バイト列を返す外部サービス。
 * 失敗はすべて GenerationError として投げる。
 */
export interface ImageGenerationService {
  editImage(request: ImageEditRequest, options: ImageEditCallOptions): Promise<Uint8Array>;
}

export const DEFAULT_IMAGE_ENDPOINT = 'https://api.openai.com/v1/images/edits';
export const DEFAULT_IMAGE_MODEL = 'gpt-image-1.5';

export interface OpenAIImageServiceOptions {
  readonly endpoint?: string | undefined;
  readonly model?: string | undefined;
  readonly fetch?: typeof fetch | undefined;
}

const imagesResponseSchema = z.object({
  data: z.array(
    z.object({
      b64_json: z.string().nullish(),
    }),
  ),
});

const errorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error: unknown) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
};

/**
 * OpenAI の images/edits エンドポイントを multipart/form-data で呼び出すクライアント。
 */
export class OpenAIImageService implements ImageGenerationService {
  private readonly endpoint: string;
  private readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIImageServiceOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_IMAGE_ENDPOINT;
    this.model = options.model ?? DEFAULT_IMAGE_MODEL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async editImage(
    request: ImageEditRequest,
    { apiKey, signal }: ImageEditCallOptions,
  ): Promise<Uint8Array> {
    const form = new FormData();
    form.append('model', this.model);
    form.append('prompt', request.prompt);
    form.append('size', request.size);
    form.append('quality', 'auto');
    form.append('output_format', 'png');
    form.append(
      'image',
      new Blob([Uint8Array.from(request.image)], { type: 'image/png' }),
      'doodle.png',
    );
    if (request.mask) {
      form.append(
        'mask',
        new Blob([Uint8Array.from(request.mask)], { type: 'image/png' }),
        'mask.png',
      );
    }

    let response: Response;
    let raw: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { Authorization: `Bearer ${apiKey}` },
        body: form,
        signal: signal ?? null,
      });
      raw = await response.text();
    } catch (error: unknown) {
      throw generationError('transportError', undefined, error);
    }

    const body = parseJson(raw);

    if (!response.ok) {
      const parsedError = errorResponseSchema.safeParse(body);
      if (parsedError.success) {
        throw generationError('serviceError', parsedError.data.error.message);
      }
      throw generationError(
        'serviceError',
        `Image API failed with status ${response.status}.`,
      );
    }

    const parsed = imagesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw generationError('serviceError', 'Unexpected response from the image API.');
    }

    const encoded = parsed.data.data[0]?.b64_json;
    const bytes = encoded ? Buffer.from(encoded, 'base64') : undefined;
    if (!bytes || bytes.length === 0) {
      throw generationError('missingImage');
    }

    return new Uint8Array(bytes);
  }
}
