/**
 * Telegram rejects messages over 4096 characters; keep some headroom
 */
export const TELEGRAM_MESSAGE_LIMIT = 4000;

const SENTENCE_PATTERN = /[.!?。]*[^.!?。]+[.!?。]*\s*/g;

/**
 * Split a long message into chunks of at most `maxLength` characters.
 * Breaks between paragraphs first, then between sentences, and only cuts
 * inside a sentence that is longer than a whole chunk.
 */
export function splitMessage(text: string, maxLength = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (maxLength < 1) {
    throw new RangeError('maxLength must be at least 1');
  }
  if (text.length <= maxLength) {
    return [text];
  }

  const segments: string[] = [];
  let current = '';

  const flush = (): void => {
    const trimmed = current.trim();
    if (trimmed) {
      segments.push(trimmed);
    }
    current = '';
  };

  const append = (piece: string, separator: string): void => {
    if (current && current.length + separator.length + piece.length > maxLength) {
      flush();
    }
    current = current ? `${current}${separator}${piece}` : piece;
  };

  for (const paragraph of text.split('\n\n')) {
    if (!paragraph.trim()) {
      continue;
    }
    if (paragraph.length <= maxLength) {
      append(paragraph, '\n\n');
      continue;
    }

    flush();
    for (const sentence of splitSentences(paragraph)) {
      if (sentence.length > maxLength) {
        flush();
        for (let i = 0; i < sentence.length; i += maxLength) {
          segments.push(sentence.slice(i, i + maxLength));
        }
      } else {
        append(sentence, ' ');
      }
    }
    flush();
  }
  flush();

  return segments;
}

function splitSentences(paragraph: string): string[] {
  const sentences = paragraph.match(SENTENCE_PATTERN) ?? [paragraph];
  return sentences.map((s) => s.trim()).filter((s) => s.length > 0);
}
