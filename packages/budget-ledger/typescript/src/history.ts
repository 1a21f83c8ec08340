// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import type { UsageEntry, UsageFilter, UsageRecord } from './types.js';

interface EntryInput {
  readonly usage: UsageRecord;
  readonly description?: string | undefined;
  readonly reservationId?: string | undefined;
}

/**
 * Build a history entry with a stable UUID and current timestamp.
 */
export function buildEntry(input: EntryInput): UsageEntry {
  return {
    id: randomUUID(),
    usage: input.usage,
    timestamp: new Date(),
    ...(input.description !== undefined && { description: input.description }),
    ...(input.reservationId !== undefined && { reservationId: input.reservationId }),
  };
}

/**
 * Apply an optional UsageFilter to a list of entries.
 * All filter fields are AND-ed together.
 */
export function filterHistory(
  entries: readonly UsageEntry[],
  filter: UsageFilter,
): readonly UsageEntry[] {
  if (filter === undefined) return [...entries];

  return entries.filter((entry) => {
    if (filter.since !== undefined && entry.timestamp < filter.since) {
      return false;
    }
    if (filter.until !== undefined && entry.timestamp > filter.until) {
      return false;
    }
    if (filter.description !== undefined && entry.description !== filter.description) {
      return false;
    }
    return true;
  });
}
