import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type {
  DatasetPayload,
  JsonValue,
  PayloadEncoding,
  PayloadField,
} from '../dataset-api/types';
import { logger } from '../dataset-api/logging';
import { fieldFromWire, payloadToWire } from './codec';
import { NotStagedError, ValidationError, parseEditedJson } from './errors';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const EncodingSchema = z.enum(['decoded', 'encoded']);

/**
 * The record part of a staged file, which is also what a user edits
 */
const EditableRecordSchema = z.object({
  code: z.string().optional(),
  bodyMeta: JsonValueSchema.optional(),
  body: JsonValueSchema.optional(),
  inputs: JsonValueSchema.optional(),
});

const StagedFileSchema = z.object({
  identifier: z.string(),
  savedAt: z.string().optional(),
  encoding: z
    .object({
      bodyMeta: EncodingSchema.optional(),
      body: EncodingSchema.optional(),
    })
    .default({}),
  record: EditableRecordSchema,
});

const CodesFileSchema = z.array(z.string());

type EditableRecord = z.infer<typeof EditableRecordSchema>;

/**
 * On-disk form of a staging entry
 */
export interface StagedFile {
  identifier: string;
  savedAt: string;
  encoding: { bodyMeta?: PayloadEncoding; body?: PayloadEncoding };
  record: EditableRecord;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function identifierFromFileName(fileName: string): string {
  const stem = fileName.slice(0, -'.json'.length);
  try {
    return decodeURIComponent(stem);
  } catch {
    return stem;
  }
}

/**
 * Rebuild a tagged field from its stored value and tag
 * An `encoded` tag only holds for text; untagged values are classified as on ingest
 */
function restoreField(value: JsonValue, encoding: PayloadEncoding | undefined): PayloadField {
  if (encoding === undefined) {
    return fieldFromWire(value);
  }
  if (encoding === 'encoded' && typeof value === 'string') {
    return { encoding: 'encoded', text: value };
  }
  return { encoding: 'decoded', value };
}

function restorePayload(
  identifier: string,
  record: EditableRecord,
  encoding: StagedFile['encoding']
): DatasetPayload {
  const payload: DatasetPayload = { code: record.code ?? identifier };
  if (record.bodyMeta !== undefined) payload.bodyMeta = restoreField(record.bodyMeta, encoding.bodyMeta);
  if (record.body !== undefined) payload.body = restoreField(record.body, encoding.body);
  if (record.inputs !== undefined) payload.inputs = record.inputs;
  return payload;
}

/**
 * Serialize a payload the way it is shown for hand editing
 */
export function renderForEditing(payload: DatasetPayload): string {
  return JSON.stringify(payloadToWire(payload), null, 2);
}

/**
 * Local staging store with file-based persistence
 *
 * One JSON file per dataset identifier, written to a temp file and renamed into
 * place so a reader sees either the previous file or the new one. Files are
 * plain JSON and may be edited by hand between pipeline stages.
 */
export class StagingStore {
  private readonly stagingDir: string;
  private readonly codesFile: string;
  private staged = new Map<string, string>();

  constructor(stagingDir = 'input_files', codesFile = 'dataset_codes.json') {
    this.stagingDir = stagingDir;
    this.codesFile = codesFile;
  }

  /**
   * File path for an identifier; identifiers are URL-encoded so any string is a safe file name
   */
  pathFor(identifier: string): string {
    return path.join(this.stagingDir, `${encodeURIComponent(identifier)}.json`);
  }

  /**
   * Identifiers staged by this store instance, in staging order
   */
  stagedIdentifiers(): string[] {
    return [...this.staged.keys()];
  }

  has(identifier: string): boolean {
    return this.staged.has(identifier);
  }

  /**
   * Persist a payload, replacing any previous copy of the same identifier
   */
  async save(identifier: string, payload: DatasetPayload): Promise<string> {
    const wire = payloadToWire(payload);
    const file: StagedFile = {
      identifier,
      savedAt: new Date().toISOString(),
      encoding: {
        ...(payload.bodyMeta ? { bodyMeta: payload.bodyMeta.encoding } : {}),
        ...(payload.body ? { body: payload.body.encoding } : {}),
      },
      record: wire,
    };

    const filePath = this.pathFor(identifier);
    await this.writeAtomic(filePath, JSON.stringify(file, null, 2));
    this.staged.set(identifier, filePath);

    logger.debug('Staged dataset', { identifier, filePath });
    return filePath;
  }

  /**
   * Load a staged payload, or null when the identifier has no local copy
   *
   * @throws {ValidationError} If the file on disk is no longer valid
   */
  async load(identifier: string): Promise<DatasetPayload | null> {
    const filePath = this.pathFor(identifier);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        this.staged.delete(identifier);
        return null;
      }
      throw error;
    }

    const parsed = StagedFileSchema.safeParse(parseEditedJson(identifier, content));
    if (!parsed.success) {
      throw new ValidationError(identifier, parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }

    this.staged.set(identifier, filePath);
    return restorePayload(identifier, parsed.data.record, parsed.data.encoding);
  }

  /**
   * Replace a staged payload with hand-edited JSON
   * On any validation failure the staged copy is left as it was
   *
   * @throws {NotStagedError} If there is no local copy to edit
   * @throws {ValidationError} If the text is not a JSON object
   */
  async saveEdit(identifier: string, text: string): Promise<DatasetPayload> {
    const previous = await this.load(identifier);
    if (!previous) {
      throw new NotStagedError(identifier);
    }

    const parsed = EditableRecordSchema.safeParse(parseEditedJson(identifier, text));
    if (!parsed.success) {
      throw new ValidationError(identifier, 'dataset JSON must be an object whose "code", if present, is a string');
    }

    const payload = restorePayload(identifier, parsed.data, {
      bodyMeta: previous.bodyMeta?.encoding,
      body: previous.body?.encoding,
    });
    await this.save(identifier, payload);

    logger.info('Saved local edits', { identifier });
    return payload;
  }

  /**
   * Delete one local copy
   * @returns Whether a file was removed
   */
  async remove(identifier: string): Promise<boolean> {
    this.staged.delete(identifier);
    try {
      await fs.unlink(this.pathFor(identifier));
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Remove every staged file and forget what was staged
   *
   * The directory is renamed aside before it is deleted, so a later read finds
   * either the full directory or none at all. Clearing an empty workspace is a no-op.
   */
  async clear(): Promise<void> {
    this.staged.clear();

    const trashPath = `${this.stagingDir}.${randomUUID()}.trash`;
    try {
      await fs.rename(this.stagingDir, trashPath);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return;
      }
      throw error;
    }

    await fs.rm(trashPath, { recursive: true, force: true });
    logger.info('Cleared staging workspace', { stagingDir: this.stagingDir });
  }

  /**
   * Rebuild the list of staged identifiers from the directory contents
   */
  async refresh(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.stagingDir);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        this.staged.clear();
        return [];
      }
      throw error;
    }

    this.staged.clear();
    for (const entry of entries.filter(name => name.endsWith('.json')).sort()) {
      this.staged.set(identifierFromFileName(entry), path.join(this.stagingDir, entry));
    }
    return this.stagedIdentifiers();
  }

  /**
   * Persist the listed identifiers (a JSON array of strings)
   */
  async saveCodes(identifiers: readonly string[]): Promise<void> {
    await this.writeAtomic(this.codesFile, JSON.stringify(identifiers, null, 2));
  }

  /**
   * Identifiers from the codes file, or an empty list before the first listing
   */
  async loadCodes(): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.codesFile, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const parsed = CodesFileSchema.safeParse(parseEditedJson(this.codesFile, content));
    if (!parsed.success) {
      throw new ValidationError(this.codesFile, 'codes file must be a JSON array of strings');
    }
    return parsed.data;
  }

  private async writeAtomic(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      const handle = await fs.open(tempPath, 'r+');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
