import { Inquiry, INQUIRY_COLUMNS } from "../types/inquiry";

/**
 * Zip a data row with the header row
 * Cells past the header are dropped; a later duplicate header wins
 */
export function mapRowToFields(header: string[], row: string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  const width = Math.min(header.length, row.length);

  for (let i = 0; i < width; i++) {
    fields[header[i]] = row[i];
  }

  return fields;
}

/**
 * Map one sheet row to an Inquiry
 */
export function mapRowToInquiry(
  header: string[],
  row: string[],
  rowNumber: number
): Inquiry {
  const fields = mapRowToFields(header, row);

  const getValue = (column: string): string | null =>
    Object.prototype.hasOwnProperty.call(fields, column) ? fields[column] : null;

  return {
    rowNumber,
    timestamp: getValue(INQUIRY_COLUMNS.timestamp),
    companyName: getValue(INQUIRY_COLUMNS.companyName),
    contactEmail: getValue(INQUIRY_COLUMNS.contactEmail),
    companyWebsite: getValue(INQUIRY_COLUMNS.companyWebsite),
    description: getValue(INQUIRY_COLUMNS.description),
    status: getValue(INQUIRY_COLUMNS.status),
    fields,
  };
}

/**
 * A row is new while its Status cell is missing or blank
 */
export function isNewInquiry(inquiry: Inquiry): boolean {
  return (inquiry.status ?? "").trim() === "";
}

/**
 * Select unprocessed rows from the full tab contents (header first)
 * Row numbers are 1-based and count the header: data row i -> i + 2
 */
export function selectNewInquiries(rows: string[][]): Inquiry[] {
  if (rows.length < 2) {
    return [];
  }

  const [header, ...dataRows] = rows;

  return dataRows
    .map((row, index) => mapRowToInquiry(header, row, index + 2))
    .filter(isNewInquiry);
}
