export type GenerationErrorKind =
  | 'noContent'
  | 'noSelection'
  | 'serviceError'
  | 'transportError'
  | 'missingImage'
  | 'unexpected';

export class GenerationError extends Error {
  constructor(
    readonly kind: GenerationErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

const DEFAULT_MESSAGES: Record<GenerationErrorKind, string> = {
  noContent: 'Draw something before generating.',
  noSelection: 'Draw a selection with the lasso first.',
  serviceError: 'The image API returned an error.',
  transportError: 'Could not reach the image API.',
  missingImage: 'No image data returned from the image API.',
  unexpected: 'Something went wrong.',
};

export const generationError = (
  kind: GenerationErrorKind,
  message: string = DEFAULT_MESSAGES[kind],
  cause?: unknown,
): GenerationError => {
  return new GenerationError(kind, message, cause === undefined ? undefined : { cause });
};

/**
 * 任意の例外を GenerationError にそろえる。分類外の例外は unexpected になる。
 */
export const toGenerationError = (error: unknown): GenerationError => {
  if (error instanceof GenerationError) {
    return error;
  }

  if (error instanceof Error) {
    return generationError('unexpected', error.message, error);
  }

  return generationError('unexpected', DEFAULT_MESSAGES.unexpected, error);
};
