/**
 * Environment configuration
 *
 * Loaded once by each entry point and passed down explicitly.
 * Only presence is checked, and only at first use.
 */
export interface AppConfig {
  port: number;

  // Gemini
  geminiApiKey: string;
  geminiModel: string;

  // Slack incoming webhook
  slackWebhookUrl: string;

  // Google Sheets
  spreadsheetId: string;
  serviceAccountFile: string;
  sheetName: string;
  sheetReadRange: string;
  sheetWriteBackColumn: string;

  // Local SQLite store
  dbFile: string;

  // Guards POST /runs (open when empty)
  runApiKey: string;

  nodeEnv: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  return Object.freeze({
    port: parseInt(env.PORT || "3000", 10),

    geminiApiKey: env.GOOGLE_GEMINI_API_KEY || "",
    geminiModel: env.GEMINI_MODEL || "gemini-2.5-pro",

    slackWebhookUrl: env.SLACK_WEBHOOK_URL || "",

    spreadsheetId: env.SPREADSHEET_ID || "",
    serviceAccountFile: env.GOOGLE_SERVICE_ACCOUNT_FILE || "service_account.json",
    sheetName: env.SHEET_NAME || "Form Responses 1",
    sheetReadRange: env.SHEET_READ_RANGE || "A:H",
    sheetWriteBackColumn: env.SHEET_WRITE_BACK_COLUMN || "F",

    dbFile: env.DB_FILE || "opportunities.db",

    runApiKey: env.RUN_API_KEY || "",

    nodeEnv: env.NODE_ENV || "development",
  });
}
