export interface KnowledgeEntry {
  title: string;
  tags: string[];
  answer: string;
  /** Minimum overlap score for the entry to be accepted; 2 when omitted. */
  minScore?: number;
}

export interface BusinessProfile {
  companyName: string;
  town: string;
  address: string;
  hours: string;
  contact: string;
  pickupPrice?: number;
  currencySymbol: string;
}
