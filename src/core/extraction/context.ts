/**
 * Context Assembler
 *
 * Fits entry text into the provider's token budget: sentences are packed
 * into segments of at most `segmentTokens`, and the whole entry is capped
 * at `contextWindowTokens`. Pure; no I/O.
 */

/** Rough token estimate used throughout: one token per four characters. */
export const CHARS_PER_TOKEN = 4;

export interface TokenBudget {
  contextWindowTokens: number;
  segmentTokens: number;
}

export interface AssembledContext {
  segments: string[];
  /** True when text past the context window was dropped */
  truncated: boolean;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Split on sentence-ending punctuation followed by whitespace, and on
 * blank lines.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?]["')\]]?)\s+|\n\s*\n/)
    .map((s) => s.replace(/\s+/g, ' ').trim())
    .filter((s) => s.length > 0);
}

/**
 * Cut text into chunks of at most `size` characters, breaking at the last
 * space inside each window when there is one.
 */
function hardSplit(text: string, size: number): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > size) {
    const space = rest.lastIndexOf(' ', size);
    const cut = space > 0 ? space : size;
    chunks.push(rest.slice(0, cut).trim());
    rest = rest.slice(cut).trim();
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

export function assembleContext(text: string, budget: TokenBudget): AssembledContext {
  const maxChars = budget.contextWindowTokens * CHARS_PER_TOKEN;
  const segmentChars = Math.min(budget.segmentTokens, budget.contextWindowTokens) * CHARS_PER_TOKEN;

  const segments: string[] = [];
  let current = '';
  let used = 0;
  let truncated = false;

  const flush = () => {
    if (current.length > 0) segments.push(current);
    current = '';
  };

  for (const sentence of splitSentences(text)) {
    let piece = sentence;

    if (used + piece.length > maxChars) {
      truncated = true;
      // Keep whole sentences when any fit; otherwise cut the first one
      if (used > 0) break;
      piece = piece.slice(0, maxChars).trim();
    }
    used += piece.length;

    if (piece.length > segmentChars) {
      flush();
      segments.push(...hardSplit(piece, segmentChars));
    } else if (current.length === 0) {
      current = piece;
    } else if (current.length + 1 + piece.length > segmentChars) {
      flush();
      current = piece;
    } else {
      current = `${current} ${piece}`;
    }

    if (truncated) break;
  }
  flush();

  return { segments, truncated };
}
