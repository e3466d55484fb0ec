/**
 * History Log Schemas
 *
 * Runtime validation for every line of a persisted undo history log. The
 * log is JSON Lines: a header, then one operation per line.
 */

import { z } from 'zod';
import type { Edit, EditRecord } from '../../core/edit.ts';
import type { HistoryOperation } from '../../core/undo.ts';
import { err, ok, type Result } from '../../core/result.ts';

export const HISTORY_LOG_VERSION = 1;

// ============================================================================
// Core value schemas
// ============================================================================

export const PositionSchema = z.object({
  line: z.number().int().min(0),
  column: z.number().int().min(0),
});

export const RangeSchema = z.object({
  start: PositionSchema,
  end: PositionSchema,
});

export const SelectionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('line'), anchor: PositionSchema, active: PositionSchema }),
  z.object({ kind: z.literal('block'), anchor: PositionSchema, active: PositionSchema }),
]);

export const CursorSnapshotSchema = z.object({
  positions: z.array(PositionSchema).min(1),
  primary: z.number().int().min(0),
});

export const CursorStateSchema = z.object({
  cursors: CursorSnapshotSchema,
  selection: SelectionSchema,
});

export const EditSchema: z.ZodType<Edit> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('insertChar'), at: PositionSchema, char: z.string().min(1) }),
    z.object({ kind: z.literal('deleteCharBefore'), at: PositionSchema, char: z.string().min(1) }),
    z.object({ kind: z.literal('deleteCharAfter'), at: PositionSchema, char: z.string().min(1) }),
    z.object({ kind: z.literal('splitLine'), at: PositionSchema }),
    z.object({ kind: z.literal('joinLine'), line: z.number().int().min(0), column: z.number().int().min(0) }),
    z.object({ kind: z.literal('insertText'), at: PositionSchema, text: z.string() }),
    z.object({ kind: z.literal('deleteRange'), range: RangeSchema, text: z.string() }),
    z.object({ kind: z.literal('composite'), edits: z.array(EditSchema) }),
  ])
);

export const EditRecordSchema: z.ZodType<EditRecord> = z.object({
  edit: EditSchema,
  before: CursorStateSchema,
  after: CursorStateSchema,
});

// ============================================================================
// Log lines
// ============================================================================

export const HistoryHeaderSchema = z.object({
  type: z.literal('header'),
  version: z.number().int(),
  /** Modification time of the document file when the log was written */
  fileMtimeMs: z.number().nullable(),
});

export type HistoryHeader = z.infer<typeof HistoryHeaderSchema>;

export const HistoryOperationSchema: z.ZodType<HistoryOperation> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('push'), record: EditRecordSchema }),
  z.object({ type: z.literal('undo') }),
  z.object({ type: z.literal('redo') }),
  z.object({ type: z.literal('saved') }),
  z.object({ type: z.literal('unsaved') }),
]);

export interface HistoryLog {
  header: HistoryHeader;
  operations: HistoryOperation[];
}

// ============================================================================
// Codec
// ============================================================================

export function createHeader(fileMtimeMs: number | null): HistoryHeader {
  return { type: 'header', version: HISTORY_LOG_VERSION, fileMtimeMs };
}

export function serializeOperations(operations: readonly HistoryOperation[]): string {
  return operations.map((op) => `${JSON.stringify(op)}\n`).join('');
}

export function serializeLog(log: HistoryLog): string {
  return `${JSON.stringify(log.header)}\n${serializeOperations(log.operations)}`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join(', ');
}

function parseJsonLine(line: string, lineNumber: number): Result<unknown, string> {
  try {
    return ok(JSON.parse(line));
  } catch (error) {
    return err(`line ${lineNumber}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Parse a history log. Any malformed line, a missing header or an unknown
 * version fails the whole log.
 */
export function parseLog(text: string): Result<HistoryLog, string> {
  const lines = text.split('\n');
  let header: HistoryHeader | null = null;
  const operations: HistoryOperation[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? '';
    if (line.length === 0) continue;
    const json = parseJsonLine(line, i + 1);
    if (!json.ok) return json;

    if (!header) {
      const parsed = HistoryHeaderSchema.safeParse(json.value);
      if (!parsed.success) return err(`line ${i + 1}: invalid header (${formatIssues(parsed.error)})`);
      if (parsed.data.version !== HISTORY_LOG_VERSION) {
        return err(`unsupported log version ${parsed.data.version}`);
      }
      header = parsed.data;
      continue;
    }

    const parsed = HistoryOperationSchema.safeParse(json.value);
    if (!parsed.success) return err(`line ${i + 1}: ${formatIssues(parsed.error)}`);
    operations.push(parsed.data);
  }

  if (!header) return err('missing header');
  return ok({ header, operations });
}
