import { google, sheets_v4 } from 'googleapis';

const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

/**
 * A remote table that can be read and overwritten as a whole.
 */
export interface SheetTable {
  /** Human-readable location, used in log lines */
  readonly description: string;
  /** Implementations stop the request when the signal aborts */
  readRows(signal?: AbortSignal): Promise<unknown[][]>;
  writeRows(rows: string[][], signal?: AbortSignal): Promise<void>;
}

export interface GoogleSheetOptions {
  spreadsheetId: string;
  sheetName: string;
  serviceAccountFile: string;
  /** Per-request timeout handed to the HTTP layer */
  timeoutMs: number;
}

/**
 * Quote a sheet name for A1 notation ("My Sheet" -> "'My Sheet'").
 */
export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/**
 * Google Sheets tab authenticated with a service account key file.
 */
export class GoogleSheetTable implements SheetTable {
  private readonly options: GoogleSheetOptions;
  private client: sheets_v4.Sheets | null = null;

  constructor(options: GoogleSheetOptions) {
    this.options = options;
  }

  get description(): string {
    return `spreadsheet ${this.options.spreadsheetId} / ${this.options.sheetName}`;
  }

  private getClient(): sheets_v4.Sheets {
    if (!this.client) {
      const auth = new google.auth.GoogleAuth({
        keyFile: this.options.serviceAccountFile,
        scopes: SHEETS_SCOPES,
      });
      this.client = google.sheets({ version: 'v4', auth });
    }
    return this.client;
  }

  async readRows(signal?: AbortSignal): Promise<unknown[][]> {
    const sheets = this.getClient();
    const response = await sheets.spreadsheets.values.get(
      {
        spreadsheetId: this.options.spreadsheetId,
        range: quoteSheetName(this.options.sheetName),
        valueRenderOption: 'FORMATTED_VALUE',
        dateTimeRenderOption: 'FORMATTED_STRING',
      },
      { timeout: this.options.timeoutMs, signal }
    );
    return response.data.values ?? [];
  }

  /**
   * Overwrite from A1, then clear whatever is left below the new last row.
   * The sheet is never empty between the two calls, and the clear is not sent
   * once the write has been aborted.
   */
  async writeRows(rows: string[][], signal?: AbortSignal): Promise<void> {
    const sheets = this.getClient();
    const sheet = quoteSheetName(this.options.sheetName);

    await sheets.spreadsheets.values.update(
      {
        spreadsheetId: this.options.spreadsheetId,
        range: `${sheet}!A1`,
        valueInputOption: 'RAW',
        requestBody: { values: rows },
      },
      { timeout: this.options.timeoutMs, signal }
    );

    signal?.throwIfAborted();
    await sheets.spreadsheets.values.clear(
      {
        spreadsheetId: this.options.spreadsheetId,
        range: `${sheet}!A${rows.length + 1}:ZZ`,
      },
      { timeout: this.options.timeoutMs, signal }
    );
  }
}
