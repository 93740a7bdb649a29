import { DateTime } from 'luxon';
import { Contact } from '../types/booking';
import { CallRecord, CallSummary, RecordStore, Summarizer } from '../types/call';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { SummaryParseError } from '../utils/errors';
import { AnthropicSummarizer } from './anthropic.service';
import { ROW_TIMESTAMP_FORMAT } from './leads.service';
import { GoogleSheetsStore } from './sheets/google-sheets.adapter';

const NOT_AVAILABLE = 'N/A';

export function parseSummary(text: string): CallSummary {
  const summaryAt = text.indexOf('Summary:');
  const actionsAt = text.indexOf('Action Items:');
  if (summaryAt < 0 || actionsAt < 0 || actionsAt < summaryAt) {
    throw new SummaryParseError(text);
  }

  return {
    summary: text.slice(summaryAt + 'Summary:'.length, actionsAt).trim(),
    actionItems: text.slice(actionsAt + 'Action Items:'.length).trim(),
  };
}

function orNotAvailable(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : NOT_AVAILABLE;
}

/** Writes one summarized row per finished call. Never throws. */
export class CallLifecycleLogger {
  constructor(
    private summarizer: Summarizer = new AnthropicSummarizer(),
    private store: RecordStore = new GoogleSheetsStore(),
    private clock: () => DateTime = () => DateTime.now().setZone(env.BUSINESS_TIMEZONE)
  ) {}

  async summarizeAndLog(transcript: string, durationSeconds: number, contact: Partial<Contact> = {}): Promise<void> {
    if (!transcript.trim()) {
      logger.debug('Empty transcript, skipping call log');
      return;
    }

    const { summary, actionItems } = await this.summarize(transcript);

    const record: CallRecord = {
      timestamp: this.clock().toFormat(ROW_TIMESTAMP_FORMAT),
      name: orNotAvailable(contact.name),
      phone: orNotAvailable(contact.phone),
      email: orNotAvailable(contact.email),
      durationSeconds,
      summary,
      actionItems,
      transcript,
    };

    try {
      await this.store.appendCallRecord(record);
    } catch (error: unknown) {
      logger.error('Failed to log call', {
        durationSeconds,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async summarize(transcript: string): Promise<CallSummary> {
    let raw: string;
    try {
      raw = await this.summarizer.summarize(transcript);
    } catch (error: unknown) {
      logger.error('Call summary failed', { error: error instanceof Error ? error.message : String(error) });
      return { summary: '[Error] Summary could not be generated', actionItems: NOT_AVAILABLE };
    }

    try {
      return parseSummary(raw);
    } catch (error: unknown) {
      if (!(error instanceof SummaryParseError)) throw error;
      logger.warn('Call summary was not in the expected format');
      return { summary: `[Unformatted] ${raw}`, actionItems: NOT_AVAILABLE };
    }
  }
}
