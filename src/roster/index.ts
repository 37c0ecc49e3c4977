/**
 * Roster Module
 *
 * Staff records for detection plus the edits behind the `staff` commands.
 * The JSON file source validates each record with zod when listing and skips
 * the ones that do not parse, so one bad entry never hides the rest of the
 * roster. Edits validate the record they write and fail instead.
 */

import { randomUUID } from 'crypto';
import { readFile, rename, rm, writeFile } from 'fs/promises';
import { z } from 'zod';
import { formatCalendarDate, parseBirthDate, parseCalendarDate } from '../dates/index.js';
import { RosterError, hasErrorCode, toErrorMessage } from '../errors/index.js';
import { defaultLogger, type Logger } from '../observability/index.js';
import type { BirthDate, StaffRecord } from '../types/index.js';

/**
 * Roster source contract: one read-only snapshot per detection pass
 */
export interface RosterSource {
  listStaff(): Promise<StaffRecord[]>;
}

/**
 * Editable staff fields in the roster file's own format
 */
export interface StaffFields {
  name: string;
  /** Empty string clears the alias on update */
  alias?: string | null;
  email: string;
  birthday: string;
  startDate: string;
  /** Empty string clears the interests on update */
  interests?: string[] | string;
}

/**
 * Roster that can also be edited
 */
export interface RosterStore extends RosterSource {
  getStaff(id: string): Promise<StaffRecord | null>;
  /**
   * Add a record; without an id it gets one more than the largest numeric id
   *
   * @throws RosterError for an invalid record or a taken id
   */
  addStaff(fields: StaffFields & { id?: string }): Promise<StaffRecord>;
  /**
   * Apply changes to an existing record; null when the id is unknown
   *
   * @throws RosterError when the changed record is invalid
   */
  updateStaff(id: string, changes: Partial<StaffFields>): Promise<StaffRecord | null>;
  /** False when the id is unknown */
  deleteStaff(id: string): Promise<boolean>;
}

/**
 * Preferred name for greetings
 */
export function displayName(staff: StaffRecord): string {
  return staff.alias ?? staff.name;
}

// ============================================================================
// Record Parsing
// ============================================================================

const InterestsSchema = z
  .union([z.array(z.string()), z.string()])
  .optional()
  .transform((value) => {
    const items = typeof value === 'string' ? value.split(',') : value ?? [];
    const seen = new Set<string>();
    const interests: string[] = [];
    for (const item of items) {
      const trimmed = item.trim();
      const normalized = trimmed.toLowerCase();
      if (trimmed.length > 0 && !seen.has(normalized)) {
        seen.add(normalized);
        interests.push(trimmed);
      }
    }
    return interests;
  });

export const RawStaffRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string().trim().min(1),
  alias: z.string().trim().min(1).nullish().transform((value) => value ?? null),
  email: z.string().trim().email(),
  birthday: z.string(),
  startDate: z.string(),
  interests: InterestsSchema,
});

export type RawStaffRecord = z.input<typeof RawStaffRecordSchema>;

export type ParseStaffResult =
  | { success: true; record: StaffRecord }
  | { success: false; issues: string[] };

/**
 * Validate and convert one raw roster entry
 */
export function parseStaffRecord(raw: unknown): ParseStaffResult {
  const result = RawStaffRecordSchema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    };
  }

  const { birthday, startDate, ...fields } = result.data;
  const birthDate = parseBirthDate(birthday);
  const start = parseCalendarDate(startDate);
  const issues: string[] = [];
  if (!birthDate) {
    issues.push(`birthday: invalid date "${birthday}"`);
  }
  if (!start) {
    issues.push(`startDate: invalid date "${startDate}"`);
  }
  if (!birthDate || !start) {
    return { success: false, issues };
  }

  return {
    success: true,
    record: { ...fields, birthDate, startDate: start },
  };
}

/**
 * `YYYY-MM-DD`, or `--MM-DD` when the year is unknown
 */
export function formatBirthDate(date: BirthDate): string {
  if (date.year === null) {
    return `--${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
  }
  return formatCalendarDate({ year: date.year, month: date.month, day: date.day });
}

/**
 * Roster file entry for a record
 */
export function toRawStaffRecord(record: StaffRecord): RawStaffRecord & { alias: string | null; interests: string[] } {
  return {
    id: record.id,
    name: record.name,
    alias: record.alias,
    email: record.email,
    birthday: formatBirthDate(record.birthDate),
    startDate: formatCalendarDate(record.startDate),
    interests: [...record.interests],
  };
}

function withChanges(base: Record<string, unknown>, changes: Partial<StaffFields>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [field, value] of Object.entries(changes)) {
    if (value !== undefined) {
      merged[field] = field === 'alias' && value === '' ? null : value;
    }
  }
  return merged;
}

function parseOrThrow(raw: unknown): StaffRecord {
  const parsed = parseStaffRecord(raw);
  if (!parsed.success) {
    throw new RosterError(`Invalid staff record: ${parsed.issues.join('; ')}`);
  }
  return parsed.record;
}

function entryId(entry: unknown): string | null {
  if (typeof entry === 'object' && entry !== null && 'id' in entry) {
    const { id } = entry;
    if (typeof id === 'string' || typeof id === 'number') {
      return String(id);
    }
  }
  return null;
}

function isEntryObject(entry: unknown): entry is Record<string, unknown> {
  return typeof entry === 'object' && entry !== null && !Array.isArray(entry);
}

function nextNumericId(ids: Array<string | null>): string {
  const numeric = ids.filter((id): id is string => id !== null && /^\d+$/.test(id)).map(Number);
  return String(numeric.length > 0 ? Math.max(...numeric) + 1 : 1);
}

// ============================================================================
// Sources
// ============================================================================

interface RosterDocument {
  entries: unknown[];
  /** Rebuild the document around edited entries, keeping its shape */
  wrap(entries: unknown[]): unknown;
}

/**
 * Roster kept in a JSON file: either an array of records or `{ "staff": [...] }`
 *
 * Edits are serialized per instance and land via a temp file and a rename.
 */
export class JsonFileRosterSource implements RosterStore {
  private readonly path: string;
  private readonly logger: Logger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(path: string, logger: Logger = defaultLogger) {
    this.path = path;
    this.logger = logger;
  }

  async listStaff(): Promise<StaffRecord[]> {
    const { entries } = await this.readDocument(false);

    const staff: StaffRecord[] = [];
    const seenIds = new Set<string>();
    entries.forEach((entry, index) => {
      const parsed = parseStaffRecord(entry);
      if (!parsed.success) {
        this.logger.warn('Skipping invalid roster record', { index, issues: parsed.issues });
        return;
      }
      if (seenIds.has(parsed.record.id)) {
        this.logger.warn('Skipping duplicate roster id', { index, id: parsed.record.id });
        return;
      }
      seenIds.add(parsed.record.id);
      staff.push(parsed.record);
    });

    this.logger.debug('Roster loaded', { path: this.path, records: staff.length, entries: entries.length });
    return staff;
  }

  async getStaff(id: string): Promise<StaffRecord | null> {
    return (await this.listStaff()).find((record) => record.id === id) ?? null;
  }

  addStaff(fields: StaffFields & { id?: string }): Promise<StaffRecord> {
    return this.edit(async (document) => {
      const ids = document.entries.map(entryId);
      const id = fields.id ?? nextNumericId(ids);
      if (ids.includes(id)) {
        throw new RosterError(`Staff id ${id} already exists`);
      }
      const record = parseOrThrow(withChanges({ id }, fields));
      await this.writeDocument(document.wrap([...document.entries, toRawStaffRecord(record)]));
      this.logger.info('Staff member added', { id });
      return record;
    });
  }

  updateStaff(id: string, changes: Partial<StaffFields>): Promise<StaffRecord | null> {
    return this.edit(async (document) => {
      const index = document.entries.findIndex((entry) => entryId(entry) === id);
      const current = document.entries[index];
      if (index < 0 || !isEntryObject(current)) {
        return null;
      }
      const record = parseOrThrow(withChanges(current, changes));
      const entries = [...document.entries];
      entries[index] = { ...current, ...toRawStaffRecord(record), id: current.id };
      await this.writeDocument(document.wrap(entries));
      this.logger.info('Staff member updated', { id, fields: Object.keys(changes) });
      return record;
    });
  }

  deleteStaff(id: string): Promise<boolean> {
    return this.edit(async (document) => {
      const entries = document.entries.filter((entry) => entryId(entry) !== id);
      if (entries.length === document.entries.length) {
        return false;
      }
      await this.writeDocument(document.wrap(entries));
      this.logger.info('Staff member deleted', { id });
      return true;
    });
  }

  private edit<T>(operation: (document: RosterDocument) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => operation(await this.readDocument(true));
    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private async readDocument(allowMissing: boolean): Promise<RosterDocument> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (allowMissing && hasErrorCode(error, 'ENOENT')) {
        return { entries: [], wrap: (entries) => ({ staff: entries }) };
      }
      throw new RosterError(`Failed to read roster ${this.path}: ${toErrorMessage(error)}`, { cause: error });
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new RosterError(`Roster ${this.path} is not valid JSON`, { cause: error });
    }

    const entries = extractEntries(document);
    if (!entries) {
      throw new RosterError(`Roster ${this.path} must be an array or an object with a "staff" array`);
    }
    const root = document;
    return {
      entries,
      wrap: (edited) => (isEntryObject(root) ? { ...root, staff: edited } : edited),
    };
  }

  private async writeDocument(document: unknown): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new RosterError(`Failed to write roster ${this.path}: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}

function extractEntries(document: unknown): unknown[] | null {
  if (Array.isArray(document)) {
    return document;
  }
  if (typeof document === 'object' && document !== null && 'staff' in document && Array.isArray(document.staff)) {
    return document.staff;
  }
  return null;
}

/**
 * In-memory roster for tests and previews
 */
export class MemoryRosterSource implements RosterStore {
  private staff: StaffRecord[];

  constructor(staff: StaffRecord[] = []) {
    this.staff = [...staff];
  }

  async listStaff(): Promise<StaffRecord[]> {
    return this.staff.map((record) => structuredClone(record));
  }

  async getStaff(id: string): Promise<StaffRecord | null> {
    const record = this.staff.find((candidate) => candidate.id === id);
    return record ? structuredClone(record) : null;
  }

  async addStaff(fields: StaffFields & { id?: string }): Promise<StaffRecord> {
    const ids = this.staff.map((record) => record.id);
    const id = fields.id ?? nextNumericId(ids);
    if (ids.includes(id)) {
      throw new RosterError(`Staff id ${id} already exists`);
    }
    const record = parseOrThrow(withChanges({ id }, fields));
    this.staff.push(record);
    return structuredClone(record);
  }

  async updateStaff(id: string, changes: Partial<StaffFields>): Promise<StaffRecord | null> {
    const index = this.staff.findIndex((record) => record.id === id);
    const current = this.staff[index];
    if (!current) {
      return null;
    }
    const record = parseOrThrow(withChanges({ ...toRawStaffRecord(current) }, changes));
    this.staff[index] = record;
    return structuredClone(record);
  }

  async deleteStaff(id: string): Promise<boolean> {
    const before = this.staff.length;
    this.staff = this.staff.filter((record) => record.id !== id);
    return this.staff.length < before;
  }

  add(record: StaffRecord): void {
    this.staff.push(record);
  }
}
