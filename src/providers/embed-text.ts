export type EmbedTextPreparation = {
  text: string;
  original_chars: number;
  final_chars: number;
  truncated: boolean;
  was_empty: boolean;
};

export const normalizeEmbedText = (value: string): string => {
  return value.replace(/\r\n/g, "\n").replace(/\r/g, "\n").trimEnd();
};

export const prepareEmbedText = (value: string, maxChars: number): EmbedTextPreparation => {
  const normalized = normalizeEmbedText(value);
  const text = maxChars > 0 && normalized.length > maxChars ? normalized.slice(0, maxChars) : normalized;

  return {
    text,
    original_chars: normalized.length,
    final_chars: text.length,
    truncated: text.length < normalized.length,
    was_empty: text.length === 0
  };
};
