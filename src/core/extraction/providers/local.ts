/**
 * Local Heuristic Provider
 *
 * Deterministic extraction from capitalized words and short keyword lists.
 * No I/O after the lexicon is loaded; serves as the fallback for every
 * model-backed provider.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RELS } from '@/providers/graph/neo4j/constants';
import { normalizeName } from '@/providers/graph/utils';
import type { ExtractionProvider, ExtractionRequest } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// Lexicon
// ═══════════════════════════════════════════════════════════════════════════════

const lexiconSchema = z.object({
  stopwords: z.array(z.string()),
  locationCues: z.array(z.string()),
  locationSuffixes: z.array(z.string()),
  organizationSuffixes: z.array(z.string()),
  eventWords: z.array(z.string())
});

export interface Lexicon {
  stopwords: ReadonlySet<string>;
  locationCues: ReadonlySet<string>;
  locationSuffixes: ReadonlySet<string>;
  organizationSuffixes: ReadonlySet<string>;
  eventWords: ReadonlySet<string>;
}

const LEXICON_URL = new URL('../../../data/lexicon.json', import.meta.url);

let defaultLexicon: Lexicon | null = null;

export function loadLexicon(): Lexicon {
  if (!defaultLexicon) {
    const raw = lexiconSchema.parse(JSON.parse(readFileSync(LEXICON_URL, 'utf-8')));
    const lower = (words: string[]) => new Set(words.map((w) => w.toLowerCase()));
    defaultLexicon = {
      stopwords: lower(raw.stopwords),
      locationCues: lower(raw.locationCues),
      locationSuffixes: lower(raw.locationSuffixes),
      organizationSuffixes: lower(raw.organizationSuffixes),
      eventWords: lower(raw.eventWords)
    };
  }
  return defaultLexicon;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Heuristics
// ═══════════════════════════════════════════════════════════════════════════════

/** A capitalized word, optionally followed by a second one. */
const NAME_PATTERN = /\b[A-Z][a-z]+(?: [A-Z][a-z]+)?\b/g;

interface Mention {
  name: string;
  /** Lower-cased word right before the mention, if any */
  preceding: string | null;
}

export type HeuristicKind = 'PERSON' | 'LOCATION' | 'ORGANIZATION' | 'EVENT';

/**
 * Find capitalized-name mentions, dropping leading stop words
 * ("Yesterday Alice" -> "Alice").
 */
export function findMentions(text: string, lexicon: Lexicon): Mention[] {
  const mentions: Mention[] = [];

  for (const match of text.matchAll(NAME_PATTERN)) {
    const words = match[0].split(' ');
    const leading = words.findIndex((w) => !lexicon.stopwords.has(w.toLowerCase()));
    if (leading === -1) continue;

    const kept = words.slice(leading);
    const name = kept.join(' ');
    if (kept.length === 1 && lexicon.stopwords.has(name.toLowerCase())) continue;

    const before = leading > 0 ? words[leading - 1] : precedingWord(text, match.index ?? 0);
    mentions.push({ name, preceding: before ? before.toLowerCase() : null });
  }

  return mentions;
}

function precedingWord(text: string, index: number): string | null {
  const words = text.slice(0, index).match(/([A-Za-z]+)[^A-Za-z]*$/);
  return words?.[1] ?? null;
}

/**
 * Infer a kind from every mention of the same name.
 * Organization and event markers win over location cues; PERSON is the default.
 */
export function inferKind(name: string, mentions: Mention[], lexicon: Lexicon): HeuristicKind {
  const words = name.toLowerCase().split(' ');
  const lastWord = words[words.length - 1] ?? '';

  if (lexicon.organizationSuffixes.has(lastWord)) return 'ORGANIZATION';
  if (words.some((w) => lexicon.eventWords.has(w))) return 'EVENT';
  if (lexicon.locationSuffixes.has(lastWord)) return 'LOCATION';
  if (mentions.some((m) => m.preceding !== null && lexicon.locationCues.has(m.preceding))) {
    return 'LOCATION';
  }
  return 'PERSON';
}

// ═══════════════════════════════════════════════════════════════════════════════
// Provider
// ═══════════════════════════════════════════════════════════════════════════════

export class LocalHeuristicProvider implements ExtractionProvider {
  readonly name = 'local';

  constructor(private readonly lexicon: Lexicon = loadLexicon()) {}

  async extract(request: ExtractionRequest, _signal: AbortSignal): Promise<unknown> {
    const byName = new Map<string, { name: string; mentions: Mention[] }>();
    for (const mention of findMentions(request.text, this.lexicon)) {
      const key = normalizeName(mention.name);
      const existing = byName.get(key);
      if (existing) {
        existing.mentions.push(mention);
      } else {
        byName.set(key, { name: mention.name, mentions: [mention] });
      }
    }

    const entities = [...byName.values()].map(({ name, mentions }) => ({
      name,
      kind: inferKind(name, mentions, this.lexicon)
    }));

    return {
      entities,
      relations: entities.map((entity) => ({
        source: request.entryId,
        target: entity.name,
        kind: RELS.MENTIONS
      }))
    };
  }
}
