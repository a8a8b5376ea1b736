import { BusinessProfile } from '../types/knowledge';
import { Env } from './env';

type ProfileEnv = Pick<
  Env,
  'COMPANY_NAME' | 'COMPANY_TOWN' | 'COMPANY_ADDRESS' | 'COMPANY_HOURS' | 'COMPANY_CONTACT' | 'PICKUP_PRICE' | 'CURRENCY_SYMBOL'
>;

export function buildBusinessProfile(config: ProfileEnv): BusinessProfile {
  return {
    companyName: config.COMPANY_NAME,
    town: config.COMPANY_TOWN,
    address: config.COMPANY_ADDRESS,
    hours: config.COMPANY_HOURS,
    contact: config.COMPANY_CONTACT,
    pickupPrice: config.PICKUP_PRICE,
    currencySymbol: config.CURRENCY_SYMBOL,
  };
}
