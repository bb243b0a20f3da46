/**
 * Inquiry triage types
 * Matches the intake form columns and the SQLite schema
 */

// ============================================================================
// INTAKE FORM
// ============================================================================

/** Column headers the pipeline reads by name; any other columns are ignored */
export const INQUIRY_COLUMNS = {
  timestamp: "Timestamp",
  companyName: "Company Name",
  contactEmail: "Contact Email",
  companyWebsite: "Company Website",
  description: "Opportunity Description",
  status: "Status",
} as const;

/** Status literal written to the sheet and the store once a row is handled */
export const PROCESSED_STATUS = "Processed";

/**
 * One unprocessed spreadsheet row
 * Named fields are null when the column or the trailing cell is missing
 */
export interface Inquiry {
  /** 1-based sheet row, header included */
  rowNumber: number;
  timestamp: string | null;
  companyName: string | null;
  contactEmail: string | null;
  companyWebsite: string | null;
  description: string | null;
  status: string | null;
  /** Raw header -> cell mapping for the row */
  fields: Record<string, string>;
}

// ============================================================================
// AI CLASSIFICATION
// ============================================================================

/**
 * A field as the model returned it; objects and arrays arrive as JSON text
 */
export type AiValue = string | number | boolean | null;

/**
 * Parsed AI answer; a key the model left out reads as null
 * Values are not type-checked: a score of "high" stays "high"
 */
export interface Classification {
  summary: AiValue;
  alignmentScore: AiValue;
  suggestedNextStep: AiValue;
}

// ============================================================================
// DATABASE RECORD TYPES
// ============================================================================

export interface OpportunityRow {
  id: number;
  timestamp: string | null;
  company_name: string | null;
  contact_email: string | null;
  company_website: string | null;
  description: string | null;
  status: string;
  ai_summary: string | number | null;
  alignment_score: string | number | null;
}

export type OpportunityInsert = Omit<OpportunityRow, "id">;

// ============================================================================
// RUN REPORTING
// ============================================================================

export type FailedStage = "store" | "write_back";

export type InquiryOutcome =
  | {
      rowNumber: number;
      companyName: string | null;
      result: "processed";
      opportunityId: number;
      alignmentScore: AiValue;
      notified: boolean;
    }
  | {
      rowNumber: number;
      companyName: string | null;
      result: "skipped";
      reason: "no_description" | "classification_failed";
    }
  | {
      rowNumber: number;
      companyName: string | null;
      result: "failed";
      stage: FailedStage;
      error: string;
      opportunityId: number | null;
    };

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  fetched: number;
  processed: number;
  skipped: number;
  failed: number;
  outcomes: InquiryOutcome[];
}
