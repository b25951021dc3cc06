/**
 * JSON Recovery
 *
 * Models asked for "JSON only" still wrap it in markdown fences or prefix it
 * with prose.
 */

/**
 * Extract the JSON object from model text.
 * Handles:
 * - ```json ... ``` and bare ``` fences
 * - An object embedded in prose
 * - A truncated object (returned from its opening brace to the end)
 */
export function extractJSON(text: string): string {
  const mdMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const source = mdMatch?.[1] ? mdMatch[1] : text;

  const start = source.indexOf('{');
  if (start === -1) return source.trim();

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }

  return source.slice(start).trim();
}
