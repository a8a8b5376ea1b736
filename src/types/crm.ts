export interface InquiryData {
  phone: string;
  name: string;
  title: string;
  description?: string;
  locationId?: number;
  channel?: string;
}

export interface InquiryResult {
  id: string;
  [key: string]: unknown;
}

export interface CRMConfig {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface CRMAdapter {
  createInquiry(inquiry: InquiryData): Promise<InquiryResult>;
}
