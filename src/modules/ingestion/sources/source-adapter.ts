/**
 * Source Adapter: the extraction boundary.
 *
 * Each uploaded document arrives in one of a few shapes; this module maps
 * every shape onto RawRecord so nothing downstream branches on format.
 *
 *   csv        exported roster text; first record is the header
 *   pdf_table  cell grids from the text-extraction service; first row of
 *              each table is its header, booth numbers are mandatory
 *   records    already keyed rows (manual entry, JSON exports)
 */

import { parse as parseCsv } from 'csv-parse/sync';
import { RAW_FIELDS, type RawField, type RawFields, type RawRecord } from '../engine/types';

export type SourceDocument =
  | { format: 'csv'; documentId: string; text: string }
  | { format: 'pdf_table'; documentId: string; tables: (string | null)[][][] }
  | {
      format: 'records';
      documentId: string;
      records: Record<string, string | number | boolean | null | undefined>[];
      boothRequired?: boolean;
    };

// ── Header aliases ─────────────────────────────────────────────────

const HEADER_ALIASES: Record<RawField, string[]> = {
  name: ['name', 'voter_name', 'elector_name', 'full_name'],
  age: ['age', 'voter_age'],
  gender: ['gender', 'sex'],
  constituency: ['constituency', 'ac_name', 'assembly_constituency', 'constituency_name'],
  boothNo: ['booth_no', 'booth', 'booth_number', 'boothno', 'part_no', 'polling_booth'],
  address: ['address', 'house_address', 'residence'],
  vote: ['vote', 'voted', 'has_voted'],
};

/** "Booth No." → "booth_no", "  NAME " → "name" */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[.#]/g, '')
    .replace(/[\s-]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function resolveHeader(header: string): RawField | null {
  const key = normalizeHeader(header);
  for (const field of RAW_FIELDS) {
    if (HEADER_ALIASES[field].includes(key)) return field;
  }
  // Rosters label the column in many ways: "Booth Sl No", "No. of Booth"
  if (key.includes('booth') && key.includes('no')) return 'boothNo';
  return null;
}

// ── Row mapping ────────────────────────────────────────────────────

function mapCells(columns: (RawField | null)[], cells: (string | null)[]): RawFields {
  const fields: RawFields = {};
  columns.forEach((field, i) => {
    const value = cells[i];
    // First matching column wins when a roster repeats a field
    if (field && value != null && fields[field] === undefined) {
      fields[field] = value;
    }
  });
  return fields;
}

function isBlankRow(cells: (string | null)[]): boolean {
  return cells.every((c) => c == null || c.trim() === '');
}

function fromGrid(
  documentId: string,
  grids: (string | null)[][][],
  boothRequired: (columns: (RawField | null)[]) => boolean,
): RawRecord[] {
  const records: RawRecord[] = [];
  let rowIndex = 0;

  for (const grid of grids) {
    if (grid.length < 2) continue;
    const columns = grid[0].map((h) => (h == null ? null : resolveHeader(h)));
    const requiresBooth = boothRequired(columns);

    for (const cells of grid.slice(1)) {
      if (isBlankRow(cells)) continue;
      records.push({
        sourceDocumentId: documentId,
        rowIndex: rowIndex++,
        boothRequired: requiresBooth,
        fields: mapCells(columns, cells),
      });
    }
  }

  return records;
}

function stringify(value: string | number | boolean | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return String(value);
}

// ── Public API ─────────────────────────────────────────────────────

export function toRawRecords(doc: SourceDocument): RawRecord[] {
  switch (doc.format) {
    case 'csv': {
      const rows: string[][] = parseCsv(doc.text, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
      // A CSV export carries booth numbers only if it has the column
      return fromGrid(doc.documentId, [rows], (columns) => columns.includes('boothNo'));
    }

    case 'pdf_table':
      return fromGrid(doc.documentId, doc.tables, () => true);

    case 'records':
      return doc.records.map((record, rowIndex) => {
        const fields: RawFields = {};
        for (const [header, value] of Object.entries(record)) {
          const field = resolveHeader(header);
          const text = stringify(value);
          if (field && text !== undefined && fields[field] === undefined) {
            fields[field] = text;
          }
        }
        return {
          sourceDocumentId: doc.documentId,
          rowIndex,
          boothRequired: doc.boothRequired ?? false,
          fields,
        };
      });
  }
}
