import fs from 'fs';
import { z } from 'zod';
import defaultEntries from '../data/knowledge-base.json';
import synonymTable from '../data/synonyms.json';
import { BusinessProfile, KnowledgeEntry } from '../types/knowledge';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_MIN_SCORE = 2;

const entrySchema = z.object({
  title: z.string().min(1),
  tags: z.array(z.string().min(1)).min(1),
  answer: z.string().min(1),
  minScore: z.number().int().positive().optional(),
});

const entriesSchema = z.array(entrySchema);

const synonymsSchema = z.record(z.array(z.string().min(1)));

export interface KnowledgeMatch {
  entry: KnowledgeEntry;
  score: number;
}

function buildSynonymIndex(table: Record<string, string[]>): Map<string, string> {
  const index = new Map<string, string>();
  for (const [canonical, variants] of Object.entries(table)) {
    index.set(canonical, canonical);
    for (const variant of variants) {
      index.set(variant.toLowerCase().replace(/ё/g, 'е'), canonical);
    }
  }
  return index;
}

const SYNONYMS = buildSynonymIndex(synonymsSchema.parse(synonymTable));

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/ё/g, 'е')
    .replace(/[^\p{L}\p{N}\s-]/gu, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export function canonicalize(tokens: string[], synonyms: Map<string, string> = SYNONYMS): Set<string> {
  return new Set(tokens.map((token) => synonyms.get(token) ?? token));
}

export function renderAnswer(template: string, profile: BusinessProfile): string {
  const pickupPrice =
    profile.pickupPrice !== undefined ? `${profile.currencySymbol}${profile.pickupPrice}` : 'a fixed local rate';

  const values: Record<string, string> = {
    company: profile.companyName,
    town: profile.town,
    address: profile.address,
    hours: profile.hours,
    contact: profile.contact,
    pickupPrice,
  };

  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

export function loadKnowledgeEntries(extraPath?: string): KnowledgeEntry[] {
  const entries = entriesSchema.parse(defaultEntries);
  if (!extraPath) return entries;

  let extra: KnowledgeEntry[];
  try {
    extra = entriesSchema.parse(JSON.parse(fs.readFileSync(extraPath, 'utf8')));
  } catch (error) {
    throw new ConfigurationError(`Knowledge base at ${extraPath} is unreadable: ${errorMessage(error)}`);
  }

  logger.info('Knowledge base extended', { path: extraPath, entries: extra.length });
  return [...entries, ...extra];
}

interface IndexedEntry {
  entry: KnowledgeEntry;
  tokens: Set<string>;
}

export class KnowledgeBaseService {
  private readonly indexed: IndexedEntry[];

  constructor(
    entries: KnowledgeEntry[],
    private profile: BusinessProfile
  ) {
    this.indexed = entries.map((entry) => ({
      entry,
      tokens: canonicalize([...entry.tags.flatMap(tokenize), ...tokenize(entry.title)]),
    }));
  }

  get size(): number {
    return this.indexed.length;
  }

  /** Highest-scoring entry; ties keep the entry declared first. */
  bestMatch(text: string): KnowledgeMatch | null {
    const query = canonicalize(tokenize(text));
    if (query.size === 0) return null;

    let best: KnowledgeMatch | null = null;
    for (const { entry, tokens } of this.indexed) {
      let score = 0;
      for (const token of query) {
        if (tokens.has(token)) score++;
      }
      if (score > 0 && (!best || score > best.score)) {
        best = { entry, score };
      }
    }
    return best;
  }

  match(text: string): string | null {
    const best = this.bestMatch(text);
    if (!best) return null;

    const threshold = best.entry.minScore ?? DEFAULT_MIN_SCORE;
    if (best.score < threshold) {
      logger.debug('FAQ match below threshold', { title: best.entry.title, score: best.score, threshold });
      return null;
    }

    logger.debug('FAQ matched', { title: best.entry.title, score: best.score });
    return renderAnswer(best.entry.answer, this.profile);
  }

  /** Closest entry even below the acceptance threshold, used as context for the language model. */
  contextHint(text: string): string | null {
    const best = this.bestMatch(text);
    return best ? renderAnswer(best.entry.answer, this.profile) : null;
  }
}

const PICKUP_INTENT = /(эвакуатор|эвакуаци|\btow(?:ing)?\b|tow\s*truck|pick\s*-?\s*up|collect\s+(?:my|the)\s+(?:bike|motorcycle|scooter)|забер[её]те|забрать\s+(?:мот|байк|скутер))/i;
const ADDRESS_INTENT = /(адрес|где\s+вы(?:\s+находитесь)?|where\s+are\s+you|your\s+address|\baddress\b|\blocation\b)/i;

/** Single-keyword intents answered before the general matcher. */
export function quickIntentAnswer(text: string, profile: BusinessProfile): string | null {
  if (PICKUP_INTENT.test(text)) {
    const price =
      profile.pickupPrice !== undefined
        ? ` for a fixed ${profile.currencySymbol}${profile.pickupPrice}`
        : '';
    return `Yes, we can pick up your bike with our tow truck anywhere in ${profile.town}${price}. Send your phone number and address and we'll arrange it.`;
  }

  if (ADDRESS_INTENT.test(text)) {
    return `${profile.companyName} is at ${profile.address}. Opening hours: ${profile.hours}.`;
  }

  return null;
}
