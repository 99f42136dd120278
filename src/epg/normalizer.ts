/**
 * Programme Normalizer
 * Turns one channel's raw schedule into ordered programmes with stop times
 */

import type { Programme, RawScheduleEntry } from '../types/epg';
import { sanitizeText } from '../utils/text-sanitizer';

/**
 * Normalize a channel's schedule.
 *
 * The stop of each programme is its own explicit end (or start + duration)
 * when that lies after the start, otherwise the start of the next programme.
 * The last programme keeps no stop when it has no explicit one; no default
 * duration is assumed.
 */
export function normalizeSchedule(channelId: string, entries: RawScheduleEntry[]): Programme[] {
  const usable = entries
    .map((entry) => ({ ...entry, title: sanitizeText(entry.title) }))
    .filter((entry) => entry.title !== '' && Number.isFinite(entry.start))
    .sort((a, b) => a.start - b.start);

  return usable.map((entry, index) => {
    const programme: Programme = {
      channelId,
      title: entry.title,
      start: entry.start,
    };

    const stop = explicitStop(entry) ?? inferredStop(entry, usable[index + 1]);
    if (stop !== undefined) {
      programme.stop = stop;
    }

    const description = sanitizeText(entry.description);
    if (description) {
      programme.description = description;
    }

    if (entry.image) {
      programme.icon = entry.image;
    }

    return programme;
  });
}

function explicitStop(entry: RawScheduleEntry): number | undefined {
  if (entry.end !== undefined && Number.isFinite(entry.end) && entry.end > entry.start) {
    return entry.end;
  }
  if (entry.durationMinutes !== undefined && entry.durationMinutes > 0) {
    return entry.start + entry.durationMinutes * 60 * 1000;
  }
  return undefined;
}

function inferredStop(entry: RawScheduleEntry, next: RawScheduleEntry | undefined): number | undefined {
  if (next && next.start > entry.start) {
    return next.start;
  }
  return undefined;
}
