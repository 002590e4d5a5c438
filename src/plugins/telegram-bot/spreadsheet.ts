import * as XLSX from 'xlsx';
import { extractPhone } from './phone.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SPREADSHEET PHONES: numbers for bulk registration from an uploaded sheet
// ═══════════════════════════════════════════════════════════════════════════════

/** Header of the name column in a MoySklad counterparty export, then a plain fallback */
export const PHONE_COLUMNS = ['Наименование', 'Name'] as const;

export const MAX_SPREADSHEET_BYTES = 10 * 1024 * 1024;

export function isSpreadsheetName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith('.xlsx') || lower.endsWith('.xls');
}

export interface SheetPhones {
  /** Normalised and de-duplicated, in sheet order */
  phones: string[];
  rows: number;
  /** Header the numbers were read from, null when none matched */
  column: string | null;
}

/**
 * Read phone numbers from the first sheet of a workbook.
 *
 * @throws when the data is not a readable workbook
 */
export function readSheetPhones(data: Buffer): SheetPhones {
  const workbook = XLSX.read(data, { type: 'buffer' });
  const firstSheet = workbook.SheetNames[0];
  if (firstSheet === undefined) return { phones: [], rows: 0, column: null };

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[firstSheet], { defval: '' });
  const column = PHONE_COLUMNS.find((header) => rows.some((row) => header in row)) ?? null;
  if (column === null) return { phones: [], rows: rows.length, column };

  const phones = new Set<string>();
  for (const row of rows) {
    const phone = extractPhone(String(row[column] ?? ''));
    if (phone !== null) phones.add(phone);
  }

  return { phones: [...phones], rows: rows.length, column };
}
