export const GENERATION_STYLES = ['playful', 'watercolor', 'sticker'] as const;

export type GenerationStyle = (typeof GENERATION_STYLES)[number];

export const DEFAULT_GENERATION_STYLE: GenerationStyle = 'playful';

const BASE_INSTRUCTION =
  "Create an illustration based on the provided doodle. Preserve the subject's shape and pose. Use clean lines and a friendly, charming vibe. No text.";

const STYLE_DIRECTIVES: Record<GenerationStyle, string> = {
  playful: 'Style: cute and playful, with soft pastel colors.',
  watercolor: 'Style: loose watercolor painting with gentle washes of color.',
  sticker: 'Style: bold sticker art with thick outlines and flat colors.',
};

export const isGenerationStyle = (value: string): value is GenerationStyle => {
  return GENERATION_STYLES.some((style) => style === value);
};

export const buildPrompt = (style: GenerationStyle): string => {
  return `${BASE_INSTRUCTION}\n\n${STYLE_DIRECTIVES[style]}`;
};
