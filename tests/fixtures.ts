import { BusinessProfile } from '../src/types/knowledge';
import { Channel, Session } from '../src/types/session';
import { createSession } from '../src/services/session.service';

export const profile: BusinessProfile = {
  companyName: 'Moto Service',
  town: 'Cape Town',
  address: '12 Main Road',
  hours: 'Mon-Fri 8:00-17:00',
  contact: '',
  pickupPrice: 350,
  currencySymbol: 'R',
};

export function makeSession(overrides: Partial<Session> = {}, channel: Channel = 'telegram'): Session {
  return { ...createSession('chat-1', channel), ...overrides };
}
