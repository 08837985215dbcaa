import { z } from 'zod';
import { DEFAULT_IMAGE_MODEL } from '../journal/generation/imageGenerationService.js';
import { DEFAULT_RENDER_SCALE } from '../journal/journal.js';

export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';
export const IMAGE_MODEL_ENV = 'DOODLE_JOURNAL_IMAGE_MODEL';
export const RENDER_SCALE_ENV = 'DOODLE_JOURNAL_RENDER_SCALE';

export interface JournalConfig {
  readonly apiKey: string | null;
  readonly imageModel: string;
  readonly renderScale: number;
}

const renderScaleSchema = z.coerce.number().positive().max(8);

const readEnv = (name: string): string | undefined => {
  const value = process.env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
};

/**
 * 環境変数からホスト設定を読み取る。呼び出しのたびに評価する。
 */
export const resolveJournalConfig = (): JournalConfig => {
  const rawScale = readEnv(RENDER_SCALE_ENV);
  let renderScale = DEFAULT_RENDER_SCALE;
  if (rawScale !== undefined) {
    const parsed = renderScaleSchema.safeParse(rawScale);
    if (!parsed.success) {
      throw new Error(`${RENDER_SCALE_ENV} must be a number between 0 and 8: ${rawScale}`);
    }
    renderScale = parsed.data;
  }

  return {
    apiKey: readEnv(OPENAI_API_KEY_ENV) ?? null,
    imageModel: readEnv(IMAGE_MODEL_ENV) ?? DEFAULT_IMAGE_MODEL,
    renderScale,
  };
};
