import { google, sheets_v4 } from "googleapis";
import { AppConfig } from "../config";
import { Classification, PROCESSED_STATUS } from "../types/inquiry";

const SHEETS_SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

/**
 * Read-all and update-one access to a single tab
 */
export interface SheetsGateway {
  readRows(): Promise<string[][]>;
  writeBack(rowNumber: number, classification: Classification): Promise<void>;
}

export type SheetsConfig = Pick<
  AppConfig,
  "spreadsheetId" | "serviceAccountFile" | "sheetName" | "sheetReadRange" | "sheetWriteBackColumn"
>;

export type SheetCell = string | number | boolean;

/**
 * Build an A1 range on a named tab, e.g. 'Form Responses 1'!A:H
 */
export function a1Range(sheetName: string, range: string): string {
  return `'${sheetName.replace(/'/g, "''")}'!${range}`;
}

/**
 * Status, Summary, Score, left to right from the write-back column
 */
export function buildWriteBackValues(classification: Classification): SheetCell[][] {
  return [
    [
      PROCESSED_STATUS,
      classification.summary ?? "",
      classification.alignmentScore ?? "",
    ],
  ];
}

/**
 * Normalise the API's cell values to text
 */
export function toRows(values: unknown[][] | null | undefined): string[][] {
  if (!values) return [];
  return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
}

/**
 * The two spreadsheets.values calls the gateway makes
 */
export interface SheetValuesClient {
  get(params: { spreadsheetId: string; range: string }): Promise<{
    data: { values?: unknown[][] | null };
  }>;
  update(params: {
    spreadsheetId: string;
    range: string;
    valueInputOption: "USER_ENTERED" | "RAW";
    requestBody: { values: SheetCell[][] };
  }): Promise<unknown>;
}

export function createSheetValuesClient(serviceAccountFile: string): SheetValuesClient {
  const auth = new google.auth.GoogleAuth({
    keyFile: serviceAccountFile,
    scopes: SHEETS_SCOPES,
  });
  const api: sheets_v4.Sheets = google.sheets({ version: "v4", auth });

  return {
    get: (params) => api.spreadsheets.values.get(params),
    update: (params) => api.spreadsheets.values.update(params),
  };
}

/**
 * Google Sheets gateway over a service-account client
 */
export function createSheetsGateway(
  config: SheetsConfig,
  values: SheetValuesClient = createSheetValuesClient(config.serviceAccountFile)
): SheetsGateway {
  const requireSpreadsheetId = (): string => {
    if (!config.spreadsheetId) {
      throw new Error("SPREADSHEET_ID is not configured");
    }
    return config.spreadsheetId;
  };

  return {
    async readRows(): Promise<string[][]> {
      const range = a1Range(config.sheetName, config.sheetReadRange);

      try {
        const { data } = await values.get({
          spreadsheetId: requireSpreadsheetId(),
          range,
        });
        const rows = toRows(data.values);
        console.log(`[sheets] Read ${rows.length} rows from ${range}`);
        return rows;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error("[sheets] Read error:", message);
        throw new Error(`Failed to read sheet rows: ${message}`);
      }
    },

    async writeBack(rowNumber: number, classification: Classification): Promise<void> {
      const range = a1Range(config.sheetName, `${config.sheetWriteBackColumn}${rowNumber}`);

      try {
        await values.update({
          spreadsheetId: requireSpreadsheetId(),
          range,
          valueInputOption: "USER_ENTERED",
          requestBody: { values: buildWriteBackValues(classification) },
        });
        console.log(`[sheets] Updated row ${rowNumber}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[sheets] Write-back error on row ${rowNumber}:`, message);
        throw new Error(`Failed to update sheet row ${rowNumber}: ${message}`);
      }
    },
  };
}
