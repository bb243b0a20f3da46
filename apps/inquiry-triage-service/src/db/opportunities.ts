import { withConnection, OPPORTUNITIES_TABLE } from "./sqlite";
import {
  AiValue,
  Classification,
  Inquiry,
  OpportunityInsert,
  PROCESSED_STATUS,
} from "../types/inquiry";

const INSERT_SQL = `
INSERT INTO ${OPPORTUNITIES_TABLE} (
    timestamp, company_name, contact_email, company_website,
    description, status, ai_summary, alignment_score
) VALUES (
    @timestamp, @company_name, @contact_email, @company_website,
    @description, @status, @ai_summary, @alignment_score
)`;

/**
 * Append-only writes of classified inquiries
 */
export interface OpportunityStore {
  insert(inquiry: Inquiry, classification: Classification): Promise<number>;
}

/**
 * SQLite binds no booleans; store them as 1/0
 */
function toSqlValue(value: AiValue): string | number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

/**
 * Convert an inquiry and its classification to a row
 */
export function toOpportunityInsert(
  inquiry: Inquiry,
  classification: Classification
): OpportunityInsert {
  return {
    timestamp: inquiry.timestamp,
    company_name: inquiry.companyName,
    contact_email: inquiry.contactEmail,
    company_website: inquiry.companyWebsite,
    description: inquiry.description,
    status: PROCESSED_STATUS,
    ai_summary: toSqlValue(classification.summary),
    alignment_score: toSqlValue(classification.alignmentScore),
  };
}

/**
 * Insert one opportunity; the connection is opened and closed per call
 * Returns the new row id
 */
export async function insertOpportunity(
  dbFile: string,
  inquiry: Inquiry,
  classification: Classification
): Promise<number> {
  const record = toOpportunityInsert(inquiry, classification);

  try {
    const id = withConnection(dbFile, (db) => {
      const info = db.prepare(INSERT_SQL).run(record);
      return Number(info.lastInsertRowid);
    });
    console.log(`[opportunities] Stored '${record.company_name}' as #${id}`);
    return id;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[opportunities] Insert error:", message);
    throw new Error(`Failed to store opportunity: ${message}`);
  }
}

export function createOpportunityStore(dbFile: string): OpportunityStore {
  return {
    insert: (inquiry, classification) => insertOpportunity(dbFile, inquiry, classification),
  };
}
