/**
 * Sepehr API Client
 * Fetches the IRIB Quran TV schedule one day at a time with signed requests
 */

import axios, { AxiosInstance } from 'axios';
import type { AuthorizationProvider } from '../auth/authorization';
import { FetchError } from '../errors';
import type { AppConfig } from '../types/config';
import type { Channel, RawScheduleEntry, ScheduleSource } from '../types/epg';
import type { SepehrEPGResponse, SepehrProgramme } from '../types/sepehr';
import { addDays, calendarDateIn, formatCalendarDate } from '../utils/time';
import { describeError } from './http';

export class SepehrClient implements ScheduleSource {
  readonly channel: Channel;
  private readonly config: AppConfig;
  private readonly authorization: AuthorizationProvider;
  private readonly axiosInstance: AxiosInstance;
  private readonly now: () => number;

  constructor(
    config: AppConfig,
    channel: Channel,
    authorization: AuthorizationProvider,
    axiosInstance?: AxiosInstance,
    now: () => number = Date.now
  ) {
    this.config = config;
    this.channel = channel;
    this.authorization = authorization;
    this.now = now;

    // No retry: a failed request counts as an empty day or channel
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        timeout: config.http.timeout,
      });
  }

  /**
   * Fetch the schedule for the configured number of days, starting today.
   * Stops at the first day without data since the API has nothing further.
   */
  async fetchSchedule(): Promise<RawScheduleEntry[]> {
    const today = calendarDateIn(this.now(), this.config.timezone);
    const entries: RawScheduleEntry[] = [];
    const earlierStarts = new Set<number>();

    for (let offset = 0; offset < this.config.sepehr.days; offset++) {
      const date = formatCalendarDate(addDays(today, offset));

      let programmes: SepehrProgramme[];
      try {
        programmes = await this.fetchDay(date);
      } catch (error) {
        if (offset === 0) {
          throw new FetchError(this.channel.id, `failed to fetch ${date}: ${describeError(error)}`, {
            cause: error,
          });
        }
        console.warn(`  ${date}: request failed (${describeError(error)}), keeping ${offset} day(s)`);
        break;
      }

      console.log(`  ${date}: ${programmes.length} programmes`);

      if (programmes.length === 0 && offset > 0) {
        break;
      }

      const day = programmes
        .map(toRawEntry)
        .filter((entry): entry is RawScheduleEntry => entry !== null);

      // Adjacent days can repeat the midnight item; items within one day are kept as sent
      for (const entry of day) {
        if (!earlierStarts.has(entry.start)) {
          entries.push(entry);
        }
      }
      for (const entry of day) {
        earlierStarts.add(entry.start);
      }
    }

    return entries.sort((a, b) => a.start - b.start);
  }

  /**
   * Fetch a single day. The API answers 500 for dates it has no data for yet.
   */
  async fetchDay(date: string): Promise<SepehrProgramme[]> {
    const url = this.config.sepehr.apiBase;
    const params = {
      channel_id: String(this.config.sepehr.channelId),
      date,
    };

    const headers = {
      Accept: '*/*',
      Origin: 'https://sepehrtv.ir',
      Referer: 'https://sepehrtv.ir/',
      'User-Agent': this.config.http.userAgent,
      Authorization: this.authorization.authorize({ method: 'GET', url, params }),
    };

    try {
      const response = await this.axiosInstance.get<SepehrEPGResponse>(url, { params, headers });
      const list: unknown = response.data?.list;
      return Array.isArray(list) ? list.filter(isProgrammeRecord) : [];
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 500) {
        return [];
      }
      throw error;
    }
  }
}

function isProgrammeRecord(value: unknown): value is SepehrProgramme {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Map one vendor item; items without a usable start or title give null
 */
function toRawEntry(programme: SepehrProgramme): RawScheduleEntry | null {
  const title = optionalString(programme.title);
  const start = programme.start;
  if (typeof start !== 'number' || !Number.isFinite(start) || start <= 0 || !title) {
    return null;
  }

  const entry: RawScheduleEntry = { title, start };

  if (typeof programme.duration === 'number' && programme.duration > 0) {
    entry.durationMinutes = programme.duration;
  }

  const description = optionalString(programme.descFull) || optionalString(programme.descSummary);
  if (description) {
    entry.description = description;
  }

  const image = optionalString(programme.imageUrl);
  if (image) {
    entry.image = image;
  }

  return entry;
}
