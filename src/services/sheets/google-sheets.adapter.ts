import { google, sheets_v4 } from 'googleapis';
import { CallRecord, LeadRow, RecordStore } from '../../types/call';
import { env } from '../../config/env';
import { logger } from '../../utils/logger';
import { ConfigurationError, ExternalServiceError, toError } from '../../utils/errors';
import { createGoogleAuth } from '../google/credentials';

export interface SpreadsheetIds {
  leads?: string;
  callLogs?: string;
}

/** Append-only rows in two spreadsheets: leads and call logs. */
export class GoogleSheetsStore implements RecordStore {
  private sheets: sheets_v4.Sheets | null = null;

  constructor(
    private spreadsheets: SpreadsheetIds = {
      leads: env.LEADS_SPREADSHEET_ID,
      callLogs: env.CALL_LOGS_SPREADSHEET_ID,
    }
  ) {}

  private client(): sheets_v4.Sheets {
    if (!this.sheets) {
      const auth = createGoogleAuth('Google Sheets', ['https://www.googleapis.com/auth/spreadsheets']);
      this.sheets = google.sheets({ version: 'v4', auth });
    }
    return this.sheets;
  }

  async appendLead(row: LeadRow): Promise<void> {
    if (!this.spreadsheets.leads) {
      throw new ConfigurationError('Lead store', 'LEADS_SPREADSHEET_ID');
    }

    await this.append(this.spreadsheets.leads, 'appendLead', [row.timestamp, row.name, row.phone, row.email]);
    logger.info('Lead appended', { name: row.name });
  }

  async appendCallRecord(record: CallRecord): Promise<void> {
    if (!this.spreadsheets.callLogs) {
      throw new ConfigurationError('Call log store', 'CALL_LOGS_SPREADSHEET_ID');
    }

    await this.append(this.spreadsheets.callLogs, 'appendCallRecord', [
      record.timestamp,
      record.name,
      record.phone,
      record.email,
      record.durationSeconds.toFixed(2),
      record.summary,
      record.actionItems,
      record.transcript,
    ]);
    logger.info('Call record appended', { durationSeconds: record.durationSeconds });
  }

  private async append(spreadsheetId: string, operation: string, values: string[]): Promise<void> {
    const sheets = this.client();

    try {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range: 'A1',
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: [values] },
      });
    } catch (error: unknown) {
      throw new ExternalServiceError('GoogleSheets', operation, toError(error));
    }
  }
}
