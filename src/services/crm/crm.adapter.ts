import { CRMAdapter, CRMConfig } from '../../types/crm';
import { RoAppAdapter } from './roapp.adapter';

export class CRMFactory {
  static create(crmType: string, config: CRMConfig): CRMAdapter {
    switch (crmType) {
      case 'roapp':
        return new RoAppAdapter(config);
      default:
        throw new Error(`Unsupported CRM type: ${crmType}`);
    }
  }
}
