export type CallStatus = 'in_progress' | 'escalation_requested' | 'completed_normally';

export interface LeadRow {
  timestamp: string;
  name: string;
  phone: string;
  email: string;
}

export interface CallRecord extends LeadRow {
  durationSeconds: number;
  summary: string;
  actionItems: string;
  transcript: string;
}

export interface RecordStore {
  appendLead(row: LeadRow): Promise<void>;
  appendCallRecord(record: CallRecord): Promise<void>;
}

export interface Summarizer {
  summarize(transcript: string): Promise<string>;
}

export interface CallSummary {
  summary: string;
  actionItems: string;
}

export type EscalationDecision =
  | { action: 'continue' }
  | { action: 'transfer'; message: string }
  | { action: 'decline_with_contact'; message: string; contact: string };

export interface StatusReporter {
  report(callSid: string, status: CallStatus): Promise<void>;
}

export interface TranscriptEntry {
  role: 'user' | 'assistant' | 'system';
  text: string;
}

