/**
 * Data Formatter Service
 *
 * Converts between the wire representation (string-keyed records) and the
 * internal rows keyed by the field registry, fills gaps in regular series and
 * renders rows as CSV for export.
 */

import { SchemaMismatchError } from '../errors.js';
import type { Field, FieldType, FieldValues, Frequency, Row, WireRecord } from '../types.js';
import { createLogger, LOG_NAMESPACES } from '../utils/index.js';
import { formatDateTimeForAPI, FREQUENCY_MS, toCanonicalDate } from '../utils/datetime.js';

const logger = createLogger(LOG_NAMESPACES.FORMATTER);

interface FieldSpec {
  /** Key used on the wire */
  wire: string;
  type: FieldType;
}

/**
 * Closed set of fields known to the pipeline. Anything else is dropped on the
 * way in.
 */
export const FIELD_REGISTRY: { readonly [F in Field]: FieldSpec } = {
  deviceId: { wire: 'id', type: 'string' },
  label: { wire: 'label', type: 'string' },
  latitude: { wire: 'latitude', type: 'float' },
  longitude: { wire: 'longitude', type: 'float' },
  radius: { wire: 'radius', type: 'float' },
  active: { wire: 'active', type: 'boolean' },
  timestamp: { wire: 'timestamp', type: 'datetime' },
  min: { wire: 'min', type: 'float' },
  max: { wire: 'max', type: 'float' },
  mean: { wire: 'mean', type: 'float' },
  count: { wire: 'count', type: 'integer' },
  start: { wire: 'start', type: 'datetime' },
  end: { wire: 'end', type: 'datetime' },
  date: { wire: 'date', type: 'datetime' },
  hour: { wire: 'hour', type: 'integer' },
};

const FIELDS = Object.keys(FIELD_REGISTRY).filter(isField);

const FIELD_BY_KEY = new Map<string, Field>(
  FIELDS.flatMap((field): [string, Field][] => [
    [FIELD_REGISTRY[field].wire, field],
    [field, field],
  ]),
);

function isField(key: string): key is Field {
  return Object.prototype.hasOwnProperty.call(FIELD_REGISTRY, key);
}

type FieldValue = FieldValues[Field];

/**
 * Service for moving records between their wire and internal forms
 */
export class DataFormatter {
  /**
   * Rename wire keys to registry fields, drop unknown keys and coerce values.
   * Rows that are already internal pass through unchanged.
   *
   * @throws {SchemaMismatchError} If a value cannot be coerced to its field type,
   * including timestamp strings without an offset
   *
   * @example
   * formatter.wireToInternal([{ id: 42, active: 'true', extra: 1 }])
   * // => [{ deviceId: '42', active: true }]
   */
  wireToInternal(records: readonly (WireRecord | Row)[]): Row[] {
    let dropped = 0;

    const rows = records.map((record) => {
      const row: Row = {};
      for (const [key, value] of Object.entries(record)) {
        const field = FIELD_BY_KEY.get(key);
        if (!field) {
          dropped += 1;
          continue;
        }
        assignField(row, field, coerce(field, value));
      }
      return row;
    });

    if (dropped > 0) {
      logger.debug(`Dropped ${dropped} value(s) outside the field registry`);
    }

    return rows;
  }

  /**
   * Rename registry fields back to their wire keys. Values are left as they are.
   */
  internalToWire(rows: readonly Row[]): WireRecord[] {
    return rows.map((row) => {
      const record: WireRecord = {};
      for (const field of FIELDS) {
        if (field in row) {
          record[FIELD_REGISTRY[field].wire] = row[field];
        }
      }
      return record;
    });
  }

  /**
   * Reindex a series onto the regular range between its first and last
   * timestamp. Slots without a sample get a row whose other fields are null;
   * samples that fall between slots are not kept.
   *
   * @example
   * formatter.fillMissingTimes([{ timestamp: t('12:00') }, { timestamp: t('14:00') }], 'hour')
   * // => rows at 12:00, 13:00 (gap), 14:00
   */
  fillMissingTimes(rows: readonly Row[], frequency: Frequency): Row[] {
    const byTime = new Map<number, Row>();
    const fields = new Set<Field>();

    for (const row of rows) {
      if (!row.timestamp) continue;

      const time = row.timestamp.getTime();
      if (!byTime.has(time)) {
        byTime.set(time, row);
      }
      for (const key of Object.keys(row)) {
        if (isField(key) && key !== 'timestamp') {
          fields.add(key);
        }
      }
    }

    if (byTime.size === 0) {
      return [];
    }

    const times = Array.from(byTime.keys());
    const first = times.reduce((a, b) => Math.min(a, b));
    const last = times.reduce((a, b) => Math.max(a, b));
    const step = FREQUENCY_MS[frequency];

    const filled: Row[] = [];
    for (let time = first; time <= last; time += step) {
      filled.push(byTime.get(time) ?? gapRow(time, fields));
    }

    const gaps = filled.length - (byTime.size - countOffGrid(times, first, step));
    if (gaps > 0) {
      logger.debug(`Filled ${gaps} missing ${frequency} slot(s)`);
    }

    return filled;
  }

  /**
   * Render wire-keyed records as CSV. Dates are written as ISO timestamps and
   * gaps as empty cells.
   */
  toCsv(records: readonly WireRecord[]): string {
    const columns: string[] = [];
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!columns.includes(key)) {
          columns.push(key);
        }
      }
    }

    const lines = [columns.map(escapeCsv).join(',')];
    for (const record of records) {
      lines.push(columns.map((column) => escapeCsv(formatCell(record[column]))).join(','));
    }

    return `${lines.join('\n')}\n`;
  }
}

/**
 * Coerce a raw value to the type of its field. null and undefined become null.
 */
export function coerce(field: Field, value: unknown): FieldValue | null {
  if (value === null || value === undefined) {
    return null;
  }

  const type = FIELD_REGISTRY[field].type;
  const coerced = coerceByType(type, value);
  if (coerced === undefined) {
    throw new SchemaMismatchError(`Cannot read ${field} as ${type}`, [
      `${field}: unexpected value ${JSON.stringify(value)}`,
    ]);
  }
  return coerced;
}

function coerceByType(type: FieldType, value: unknown): FieldValue | undefined {
  switch (type) {
    case 'string':
      return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
    case 'float':
      return toNumber(value);
    case 'integer': {
      const number = toNumber(value);
      return number === undefined ? undefined : Math.trunc(number);
    }
    case 'boolean':
      return toBoolean(value);
    case 'datetime':
      if (value instanceof Date || typeof value === 'string' || typeof value === 'number') {
        return toCanonicalDate(value) ?? undefined;
      }
      return undefined;
  }
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 1 || value === 0) {
    return value === 1;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return undefined;
}

/**
 * Write a coerced value into its slot. The registry guarantees the value
 * matches the field's type.
 */
function assignField(row: Row, field: Field, value: FieldValue | null): void {
  Object.assign(row, { [field]: value });
}

function gapRow(time: number, fields: ReadonlySet<Field>): Row {
  const row: Row = { timestamp: new Date(time) };
  for (const field of fields) {
    assignField(row, field, null);
  }
  return row;
}

function countOffGrid(times: readonly number[], first: number, step: number): number {
  return times.filter((time) => (time - first) % step !== 0).length;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return formatDateTimeForAPI(value);
  }
  return String(value);
}

function escapeCsv(cell: string): string {
  return /[",\n\r]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}
