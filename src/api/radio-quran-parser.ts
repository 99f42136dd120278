/**
 * radioquran.ir schedule parsing
 * The conductor page carries descriptions and durations; the JSON feed
 * is lighter and has neither.
 */

import type { RawScheduleEntry } from '../types/epg';
import type { RadioQuranFeed, RadioQuranItem } from '../types/radio-quran';
import { sanitizeText, stripMarkup } from '../utils/text-sanitizer';
import { zonedTimeToEpoch } from '../utils/time';
import type { CalendarDate } from '../utils/time';

const SITE_ORIGIN = 'https://radioquran.ir';

const TIME_PATTERN = /fontsize-3">\s*(\d{1,2}:\d{2})\s*<\/div>/g;
const TITLE_PATTERN = /itemprop="name ">([\s\S]*?)<\/h4>/g;
const DESCRIPTION_PATTERN = /itemprop="description">([\s\S]*?)<\/p>/g;
const DURATION_PATTERN = /مدت:(\d+)\s*دقیقه/g;
const IMAGE_PATTERN = /img class="lazy" alt="[^"]*" src="([^"]+)"/g;

function captures(html: string, pattern: RegExp): string[] {
  return Array.from(html.matchAll(pattern), (match) => match[1]);
}

/**
 * Parse the ChannelConductor page.
 * Fields are matched independently and paired by position, so only the
 * shortest match list is used.
 */
export function parseRadioQuranHtml(html: string): RadioQuranItem[] {
  const times = captures(html, TIME_PATTERN);
  const titles = captures(html, TITLE_PATTERN);
  const descriptions = captures(html, DESCRIPTION_PATTERN);
  const durations = captures(html, DURATION_PATTERN);
  const images = captures(html, IMAGE_PATTERN);

  const count = Math.min(times.length, titles.length, descriptions.length, durations.length, images.length);
  if (count === 0) {
    console.warn(
      `Conductor page matched times=${times.length}, titles=${titles.length}, ` +
        `descriptions=${descriptions.length}, durations=${durations.length}, ` +
        `images=${images.length} (${html.length} chars)`
    );
    return [];
  }

  const items: RadioQuranItem[] = [];
  for (let i = 0; i < count; i++) {
    const time = padTime(times[i]);
    if (!time) {
      continue;
    }
    items.push({
      time,
      title: sanitizeText(titles[i]),
      description: stripMarkup(descriptions[i]),
      duration: parseInt(durations[i], 10),
      image: images[i],
    });
  }
  return items;
}

/**
 * Parse the JSON feed into the same shape as the conductor page
 */
export function parseRadioQuranFeed(feed: RadioQuranFeed): RadioQuranItem[] {
  const boxes = feed.Containers?.[0]?.boxes ?? [];
  const items: RadioQuranItem[] = [];

  for (const box of boxes) {
    const title = sanitizeText(box.title);
    const time = padTime(box.time ?? '');
    if (!title || !time) {
      continue;
    }

    let image = box.image ?? '';
    if (image && !image.startsWith('http')) {
      image = SITE_ORIGIN + image;
    }

    items.push({ time, title, description: '', duration: 0, image });
  }
  return items;
}

/**
 * "5:5" -> "05:05"; null when the value is not a time of day
 */
export function padTime(value: string): string | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{1,2})$/);
  if (!match) {
    return null;
  }
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/**
 * Anchor wall-clock items to a day in the guide time zone
 */
export function radioItemsToEntries(
  items: RadioQuranItem[],
  day: CalendarDate,
  timeZone: string
): RawScheduleEntry[] {
  const entries: RawScheduleEntry[] = [];

  for (const item of items) {
    const time = padTime(item.time);
    if (!item.title.trim() || !time) {
      continue;
    }

    const [hour, minute] = time.split(':').map((part) => parseInt(part, 10));
    const entry: RawScheduleEntry = {
      title: item.title,
      start: zonedTimeToEpoch(day, hour, minute, timeZone),
    };

    if (item.duration > 0) {
      entry.durationMinutes = item.duration;
    }
    if (item.description) {
      entry.description = item.description;
    }
    if (item.image) {
      entry.image = item.image;
    }

    entries.push(entry);
  }

  return entries;
}
