export type Channel = 'telegram' | 'whatsapp' | 'sms' | 'web';

export type FormState =
  | 'NONE'
  | 'AWAITING_PHONE'
  | 'AWAITING_MODEL'
  | 'AWAITING_PLATE'
  | 'AWAITING_ODOMETER'
  | 'AWAITING_ISSUE'
  | 'AWAITING_CONFIRM';

export interface HistoryTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface IntakeRecord {
  phone: string;
  makeModel: string;
  plate: string;
  odometer: number;
  issue: string;
}

export type IntakeDraft = Partial<IntakeRecord>;

export interface PartialRecord extends Partial<IntakeRecord> {
  issue: string;
}

export interface Session {
  conversationId: string;
  channel: Channel;
  formState: FormState;
  draft: IntakeDraft;
  history: HistoryTurn[];
  knownPhone?: string;
  knownName?: string;
  awaitingName: boolean;
  hintCounter: number;
  leadId?: string;
  updatedAt: string;
}
