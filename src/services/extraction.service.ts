import { z } from 'zod';
import { PartialRecord } from '../types/session';
import { EXTRACTION_PROMPT } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import {
  DEFAULT_PHONE_PATTERN,
  ISSUE_MAX_LENGTH,
  MAKE_MODEL_MAX_LENGTH,
  ODOMETER_LIMIT,
  extractPhone,
  normalizeOdometer,
  normalizePlate,
  parsePhone,
  truncate,
} from '../utils/fields';
import { logger } from '../utils/logger';
import { CompletionClient } from './llm/llm.adapter';

const MAKE_PATTERN =
  /\b(honda|yamaha|suzuki|kawasaki|ktm|bmw|ducati|harley(?:-davidson)?|triumph|aprilia|royal\s+enfield|husqvarna|benelli|cf\s?moto|zontes|lifan|loncin|jonway|vespa|piaggio|kymco|sym|bajaj|tvs|hero)\b(?:\s+[A-Za-z-]*\d[A-Za-z0-9-]*)?/i;

const NUMBER_RUN = /\d{1,3}(?:[ .,]\d{3})+|\d+/g;

// Model output is untrusted: every key is optional and re-validated below.
const modelOutputSchema = z
  .object({
    phone: z.unknown().optional(),
    makeModel: z.unknown().optional(),
    plate: z.unknown().optional(),
    odometer: z.unknown().optional(),
    issue: z.unknown().optional(),
  })
  .passthrough();

type ModelOutput = z.infer<typeof modelOutputSchema>;

export function stripCodeFence(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

export class FieldExtractionService {
  constructor(
    private completion: CompletionClient | null,
    private phonePattern: RegExp = DEFAULT_PHONE_PATTERN
  ) {}

  async extract(text: string): Promise<PartialRecord> {
    const baseline = this.extractBaseline(text);
    if (!this.completion) return baseline;

    try {
      const raw = await this.completion.complete(EXTRACTION_PROMPT, [], text);
      const parsed = modelOutputSchema.safeParse(JSON.parse(stripCodeFence(raw)));
      if (!parsed.success) {
        logger.warn('Model extraction returned an unexpected shape, using baseline', {
          issues: parsed.error.issues.length,
        });
        return baseline;
      }
      return this.mergeWithBaseline(parsed.data, baseline);
    } catch (error) {
      logger.warn('Model extraction failed, using baseline', { error: errorMessage(error) });
      return baseline;
    }
  }

  extractBaseline(text: string): PartialRecord {
    const result: PartialRecord = { issue: truncate(text, ISSUE_MAX_LENGTH) };

    const phone = extractPhone(text, this.phonePattern);
    if (phone) result.phone = phone;

    const make = text.match(MAKE_PATTERN);
    if (make) result.makeModel = truncate(make[0].replace(/\s+/g, ' '), MAKE_MODEL_MAX_LENGTH);

    // The model designation (e.g. CG125) is neither a plate nor a mileage.
    const rest = make ? text.replace(make[0], ' ') : text;

    const plate = this.findPlateCandidate(rest);
    if (plate) result.plate = plate;

    const odometer = this.findOdometer(rest, phone);
    if (odometer !== null) result.odometer = odometer;

    return result;
  }

  private findPlateCandidate(text: string): string | null {
    for (const token of text.split(/\s+/)) {
      const cleaned = token.replace(/[^\p{L}\p{N}]/gu, '');
      if (cleaned.length < 4 || cleaned.length > 10) continue;
      if (!/\p{L}/u.test(cleaned) || !/\p{N}/u.test(cleaned)) continue;
      return normalizePlate(cleaned);
    }
    return null;
  }

  private findOdometer(text: string, phone: string | null): number | null {
    let best: number | null = null;
    for (const match of text.matchAll(NUMBER_RUN)) {
      const digits = match[0].replace(/\D/g, '');
      if (phone && phone.endsWith(digits)) continue;

      const value = parseInt(digits, 10);
      if (value > 0 && value < ODOMETER_LIMIT && (best === null || value > best)) {
        best = value;
      }
    }
    return best;
  }

  private mergeWithBaseline(output: ModelOutput, baseline: PartialRecord): PartialRecord {
    const merged: PartialRecord = { ...baseline };

    const phone = typeof output.phone === 'string' ? parsePhone(output.phone, this.phonePattern) : null;
    if (phone) merged.phone = phone;

    if (typeof output.makeModel === 'string' && output.makeModel.trim()) {
      merged.makeModel = truncate(output.makeModel, MAKE_MODEL_MAX_LENGTH);
    }

    if (typeof output.plate === 'string') {
      const plate = normalizePlate(output.plate);
      if (plate.length >= 3) merged.plate = plate;
    }

    if (typeof output.odometer === 'number') {
      if (Number.isInteger(output.odometer) && output.odometer > 0 && output.odometer < ODOMETER_LIMIT) {
        merged.odometer = output.odometer;
      }
    } else if (typeof output.odometer === 'string') {
      const odometer = normalizeOdometer(output.odometer);
      if (odometer !== null) merged.odometer = odometer;
    }

    if (typeof output.issue === 'string' && output.issue.trim()) {
      merged.issue = truncate(output.issue, ISSUE_MAX_LENGTH);
    }

    return merged;
  }
}
