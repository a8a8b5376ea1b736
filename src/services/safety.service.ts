import { logger } from '../utils/logger';

export const SAFETY_REFUSAL =
  "Sorry, we don't give step-by-step instructions for repairing or taking apart a motorcycle yourself: " +
  'a mistake with brakes, chain or suspension can cost you your health. ' +
  'Our mechanics will do the job safely. Send your phone number or type /ro to book a repair.';

const RU_REPAIR_VERBS =
  '(?:заменить|поменять|снять|разобрать|собрать|починить|отремонтировать|отрегулировать|поставить|установить|перебрать|прокачать|натянуть|смазать|открутить|подтянуть)';
const EN_REPAIR_VERBS =
  '(?:fix|replace|repair|remove|disassemble|dismantle|change|adjust|install|rebuild|bleed|tighten|take\\s+apart)';

const DIY_PATTERNS: RegExp[] = [
  new RegExp(`как\\s+(?:мне\\s+)?(?:самому\\s+|самостоятельно\\s+|сам\\s+)?${RU_REPAIR_VERBS}`, 'i'),
  new RegExp(`(?:самому|самостоятельно|своими\\s+руками)[^.?!]*${RU_REPAIR_VERBS}`, 'i'),
  new RegExp(`${RU_REPAIR_VERBS}[^.?!]*(?:самому|самостоятельно|своими\\s+руками)`, 'i'),
  /пошагов/i,
  /инструкци[юяи]\s+(?:по|как)/i,
  /какие\s+(?:нужны\s+|нужен\s+)?инструмент/i,
  new RegExp(`how\\s+(?:do|can|should|would)\\s+i\\s+${EN_REPAIR_VERBS}`, 'i'),
  new RegExp(`how\\s+to\\s+${EN_REPAIR_VERBS}`, 'i'),
  new RegExp(`${EN_REPAIR_VERBS}\\s+(?:it|this|that|them|the\\s+[\\w-]+|my\\s+[\\w-]+)\\s+(?:myself|at\\s+home)`, 'i'),
  /\bdiy\b/i,
  /\bdo\s+it\s+yourself\b/i,
  /step[-\s]by[-\s]step/i,
  /what\s+tools\s+(?:do|would|will)\s+i\s+need/i,
];

// Imperative repair steps in a generated reply.
const REPAIR_STEP_INDICATORS: RegExp[] = [
  /(?:открутите|выкрутите|снимите|отсоедините|затяните|разберите|ослабьте|подденьте)/i,
  /шаг\s*\d/i,
  /\b(?:unscrew|loosen|unbolt|pry)\b/i,
  /\bstep\s*\d/i,
  /\btorque\s+(?:it|them|the|to)\b/i,
  /\bremove\s+the\s+(?:bolts?|nuts?|wheel|axle|caliper|chain|cover)\b/i,
];

const BOOKING_CLAIMS: RegExp[] = [
  /\bi(?:'ve|\s+have)?\s+(?:booked|scheduled|registered|created|reserved)\b/i,
  /\byou(?:'re|\s+are)\s+(?:booked|scheduled|registered)\b/i,
  /\b(?:appointment|booking|request|order|slot)\s+(?:is|has\s+been)\s+(?:confirmed|created|booked|scheduled|registered|reserved)\b/i,
  /записал[аи]?\s+вас/i,
  /вы\s+записаны/i,
  /заявк[аи]\s+(?:создана|оформлена|принята)/i,
];

export function isDiyRequest(text: string): boolean {
  const pattern = DIY_PATTERNS.find((p) => p.test(text));
  if (pattern) {
    logger.info('DIY request detected', { pattern: pattern.source });
    return true;
  }
  return false;
}

export function isUnsafeReply(text: string): boolean {
  return DIY_PATTERNS.some((p) => p.test(text)) || REPAIR_STEP_INDICATORS.some((p) => p.test(text));
}

/** Drops sentences that claim a booking was made. */
export function stripBookingClaims(text: string): string {
  const sentences = text.split(/(?<=[.!?])\s+/);
  const kept = sentences.filter((sentence) => !BOOKING_CLAIMS.some((p) => p.test(sentence)));
  if (kept.length === sentences.length) return text;

  logger.debug('Booking claim removed from reply', { removed: sentences.length - kept.length });
  return kept.join(' ').trim();
}
