import fs from 'fs';
import { z } from 'zod';
import { clampFades } from '../services/timeline/segment-planner.service';
import { DISPLAY_MODES, type BrollRequest } from '../types/timeline.types';
import { PlanFormatError, errnoCode, errorMessage } from './errors';

// ===========================================================================
// B-roll Plan Loader
//
//   start_sec,end_sec,type,search_query,fade_in,fade_out
//   3.0,6.5,fullframe,team collaboration,0.5,0.5
//   8.0,11.0,pip,"coffee, laptop",,
//
// fade_in/fade_out are optional (column or cell). Rows are returned in file
// order: sorting and overlap checks belong to the segment planner.
// ===========================================================================

export const REQUIRED_COLUMNS = ['start_sec', 'end_sec', 'type', 'search_query'] as const;

export interface BrollPlanOptions {
  /** Used for missing fade cells. Default: 0.5 */
  defaultFadeSeconds?: number;
}

const numberCell = z
  .string()
  .trim()
  .min(1, 'is required')
  .transform((value) => Number(value))
  .pipe(z.number({ invalid_type_error: 'must be a number' }).finite().min(0));

const BrollRowSchema = z
  .object({
    start_sec: numberCell,
    end_sec: numberCell,
    type: z.string().trim().toLowerCase().pipe(z.enum(DISPLAY_MODES)),
    search_query: z.string().trim().min(1, 'must not be empty'),
    fade_in: numberCell.optional(),
    fade_out: numberCell.optional(),
  })
  .refine((row) => row.end_sec > row.start_sec, {
    message: 'end_sec must be greater than start_sec',
    path: ['end_sec'],
  });

/**
 * Split CSV text into records. Handles quoted fields (embedded commas,
 * newlines and doubled quotes) and CRLF line endings; drops blank lines.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  const input = text.replace(/^\uFEFF/, '');

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"' && input[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && input[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new PlanFormatError('B-roll plan has an unterminated quoted field');
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((r) => !(r.length === 1 && r[0].trim() === ''));
}

/** Parse B-roll plan CSV text into typed requests. */
export function parseBrollPlan(csvText: string, options: BrollPlanOptions = {}): BrollRequest[] {
  const defaultFade = options.defaultFadeSeconds ?? 0.5;
  const [header, ...records] = parseCsv(csvText);

  if (!header) {
    throw new PlanFormatError('B-roll plan is empty');
  }

  const columns = header.map((h) => h.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new PlanFormatError(
      `B-roll plan is missing required column(s): ${missing.join(', ')} (got: ${columns.join(', ')})`,
      { missing }
    );
  }

  return records.map((cells, index) => {
    const rowNumber = index + 1;
    const record: Record<string, string> = {};
    columns.forEach((column, i) => {
      const cell = cells[i] ?? '';
      // Empty optional cells fall back to defaults
      if (cell.trim() !== '' || REQUIRED_COLUMNS.some((c) => c === column)) {
        record[column] = cell;
      }
    });

    const parsed = BrollRowSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new PlanFormatError(`Invalid B-roll plan row ${rowNumber}: ${issues}`, { row: rowNumber });
    }

    const row = parsed.data;
    const interval = { start: row.start_sec, end: row.end_sec };
    return {
      interval,
      query: row.search_query,
      displayMode: row.type,
      ...clampFades({ interval, fadeIn: row.fade_in ?? defaultFade, fadeOut: row.fade_out ?? defaultFade }),
    };
  });
}

export async function loadBrollPlan(filePath: string, options: BrollPlanOptions = {}): Promise<BrollRequest[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new PlanFormatError(`B-roll plan not found: ${filePath}`);
    }
    throw new PlanFormatError(`Cannot read B-roll plan ${filePath}: ${errorMessage(err)}`);
  }
  return parseBrollPlan(text, options);
}
