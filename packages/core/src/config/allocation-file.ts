import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { Allocation, GroupName, ParticipantId } from '../types/allocation.js';
import { TrialConfigError, formatZodErrors } from './trial-config.js';

const groupNameSchema = z.string().min(1, 'Group names must not be empty');
const membersSchema = z.array(z.union([z.string(), z.number()]));

const allocationRecordSchema = z.record(groupNameSchema, membersSchema);
const allocationEntriesSchema = z.array(z.tuple([groupNameSchema, membersSchema]));

/** Plain-object form of an allocation, suitable for JSON output. */
export function allocationToRecord(allocation: Allocation): Record<string, ParticipantId[]> {
  const record: Record<string, ParticipantId[]> = {};
  for (const [group, members] of allocation) {
    record[group] = [...members];
  }
  return record;
}

/**
 * True when the plain-object form lists groups in allocation order.
 * Integer-like group names are hoisted and sorted by object key ordering.
 */
export function preservesGroupOrder(allocation: Allocation): boolean {
  const keys = Object.keys(allocationToRecord(allocation));
  const groups = [...allocation.keys()];
  return keys.length === groups.length && keys.every((key, i) => key === groups[i]);
}

/**
 * JSON text for an allocation file: `{ "group": [ids] }`, or a list of
 * `["group", [ids]]` pairs when an object would reorder the groups.
 */
export function serializeAllocation(allocation: Allocation): string {
  const body = preservesGroupOrder(allocation)
    ? allocationToRecord(allocation)
    : [...allocation].map(([group, members]) => [group, [...members]]);
  return JSON.stringify(body, null, 2) + '\n';
}

function fromEntries(entries: Array<[GroupName, ParticipantId[]]>): Result<Allocation, TrialConfigError> {
  const allocation: Allocation = new Map();
  for (const [group, members] of entries) {
    if (allocation.has(group)) {
      return err(new TrialConfigError(`Allocation validation failed: Duplicate group name: ${group}`));
    }
    allocation.set(group, members);
  }
  return ok(allocation);
}

/**
 * Parse an allocation file written by `serializeAllocation`, in either its
 * object or its pair-list form.
 */
export function parseAllocationJSON(source: string): Result<Allocation, TrialConfigError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new TrialConfigError(`Invalid JSON in allocation file: ${message}`));
  }

  if (Array.isArray(parsed)) {
    const entriesResult = allocationEntriesSchema.safeParse(parsed);
    if (!entriesResult.success) {
      return err(new TrialConfigError(`Allocation validation failed: ${formatZodErrors(entriesResult.error)}`));
    }
    return fromEntries(entriesResult.data);
  }

  const validationResult = allocationRecordSchema.safeParse(parsed);
  if (!validationResult.success) {
    return err(new TrialConfigError(`Allocation validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(new Map(Object.entries(validationResult.data)));
}
