import { BusinessProfile } from '../types/knowledge';

const BASE_PROMPT = `You are the friendly assistant of a motorcycle and scooter repair workshop. You answer customers in the language they write in.

RULES:
- Keep replies short: two or three sentences
- Never give instructions for repairing, adjusting or taking apart a motorcycle yourself, and never list tools or steps; offer a workshop visit instead
- Never say that a booking, appointment or request has been created: only the workshop staff can do that
- Never invent prices, part availability or repair times that are not given below
- To book a repair, ask the customer for a phone number or suggest the /ro command
- If you don't know the answer, say a manager will reply soon

TONE: Polite, practical, reassuring.`;

export function buildSystemPrompt(profile: BusinessProfile, hint?: string | null): string {
  const parts: string[] = [BASE_PROMPT];

  const workshop: string[] = [`Workshop: ${profile.companyName}, ${profile.town}.`];
  workshop.push(`Address: ${profile.address}.`);
  workshop.push(`Opening hours: ${profile.hours}.`);
  if (profile.contact) {
    workshop.push(`Contact: ${profile.contact}.`);
  }
  if (profile.pickupPrice !== undefined) {
    workshop.push(`Tow-truck pickup within ${profile.town}: ${profile.currencySymbol}${profile.pickupPrice}.`);
  }
  parts.push(`\nWORKSHOP INFO:\n${workshop.join('\n')}`);

  if (hint) {
    parts.push(`\nRELEVANT FAQ ANSWER (prefer it when it answers the question):\n${hint}`);
  }

  return parts.join('\n');
}

export const EXTRACTION_PROMPT = `Extract repair-order fields from the customer's message.
Reply with ONLY a JSON object, no prose and no code fences, with exactly these keys:
{"phone": string|null, "makeModel": string|null, "plate": string|null, "odometer": number|null, "issue": string|null}

- phone: international format with leading +, digits only, or null
- makeModel: motorcycle make and model as written, e.g. "Honda CG125", or null
- plate: registration plate, letters and digits only, or null
- odometer: mileage in kilometres as an integer, or null
- issue: short description of the problem, or null
Use null for anything the message does not state.`;
