/**
 * Extraction Prompt
 *
 * One prompt shared by every model-backed provider.
 * The model sees the entry id so MENTIONS relations can name the entry as
 * their source, and the allowed kinds so labels stay inside the graph schema.
 */

import { KNOWN_ENTITY_KINDS } from '@/providers/graph/types';
import type { Message } from '@/providers/llm/types';
import type { ExtractionRequest } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// System Prompt
// ═══════════════════════════════════════════════════════════════════════════════

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You extract a knowledge graph from personal memory entries. Given one entry, you list the named things it mentions and how they relate.

# ENTITY KINDS

Classify each entity into exactly ONE of these kinds:

${KNOWN_ENTITY_KINDS.map((kind) => `- ${kind}`).join('\n')}

# RELATIONS

- Link the entry to every entity it mentions: source = the entry id, target = the entity name, kind = MENTIONS
- Link entities to each other when the text states a relation (e.g. MET, LIVES_IN, WORKS_AT)
- Relation kinds are UPPER_SNAKE_CASE
- Every relation endpoint is either the entry id or the exact name of an entity you listed
- confidence is a number between 0 and 1, or null

# OUTPUT

Respond with JSON only. No prose, no markdown fences.

{
  "entities": [{ "name": "Paris", "kind": "LOCATION", "summary": "City where Alice met Bob" }],
  "relations": [{ "source": "<entry id>", "target": "Paris", "kind": "MENTIONS", "confidence": 0.9 }]
}`;

/**
 * Render the user message for one segment.
 */
export function formatExtractionInput(request: ExtractionRequest): string {
  const notice = request.truncated
    ? `The entry was cut to fit a ${request.contextWindowTokens}-token context window; extract only from the text shown.`
    : `Context window: ${request.contextWindowTokens} tokens.`;

  return `Entry id: ${request.entryId}
${notice}

<entry>
${request.text}
</entry>`;
}

export function buildExtractionMessages(request: ExtractionRequest): Message[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: formatExtractionInput(request) }
  ];
}
