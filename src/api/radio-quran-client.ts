/**
 * Radio Quran Client
 * Reads today's schedule from radioquran.ir, no authentication needed
 */

import axios, { AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import { FetchError } from '../errors';
import type { AppConfig } from '../types/config';
import type { Channel, RawScheduleEntry, ScheduleSource } from '../types/epg';
import type { RadioQuranFeed, RadioQuranItem } from '../types/radio-quran';
import { calendarDateIn } from '../utils/time';
import { describeError } from './http';
import { parseRadioQuranFeed, parseRadioQuranHtml, radioItemsToEntries } from './radio-quran-parser';

export class RadioQuranClient implements ScheduleSource {
  readonly channel: Channel;
  private readonly config: AppConfig;
  private readonly axiosInstance: AxiosInstance;
  private readonly now: () => number;

  constructor(config: AppConfig, channel: Channel, axiosInstance?: AxiosInstance, now: () => number = Date.now) {
    this.config = config;
    this.channel = channel;
    this.now = now;

    this.axiosInstance =
      axiosInstance ??
      axios.create({
        timeout: config.http.timeout,
      });

    // The site throttles scripted clients now and then
    axiosRetry(this.axiosInstance, {
      retries: config.radioQuran.retries,
      retryDelay: () => config.radioQuran.retryDelayMs,
      retryCondition: (error) =>
        axiosRetry.isNetworkOrIdempotentRequestError(error) || (error.response?.status ?? 0) >= 500,
      onRetry: (retryCount, error) => {
        console.log(`Retry attempt ${retryCount} for ${error.config?.url}`);
      },
    });
  }

  /**
   * Conductor page first, JSON feed when the page fails or yields nothing
   */
  async fetchSchedule(): Promise<RawScheduleEntry[]> {
    const today = calendarDateIn(this.now(), this.config.timezone);

    let items: RadioQuranItem[] = [];
    let htmlFailure = 'no programmes parsed';
    try {
      console.log('  Trying conductor page...');
      items = parseRadioQuranHtml(await this.fetchHtml());
      console.log(`  Conductor page: ${items.length} programmes`);
    } catch (error) {
      htmlFailure = describeError(error);
      console.warn(`  Conductor page failed: ${htmlFailure}`);
    }

    if (items.length === 0) {
      try {
        console.log('  Falling back to JSON feed...');
        items = parseRadioQuranFeed(await this.fetchFeed());
        console.log(`  JSON feed: ${items.length} programmes (no descriptions or durations)`);
      } catch (error) {
        throw new FetchError(
          this.channel.id,
          `conductor page: ${htmlFailure}; JSON feed: ${describeError(error)}`,
          { cause: error }
        );
      }
    }

    return radioItemsToEntries(items, today, this.config.timezone);
  }

  private async fetchHtml(): Promise<string> {
    const response = await this.axiosInstance.get<string>(this.config.radioQuran.htmlUrl, {
      responseType: 'text',
      headers: this.headers(),
    });
    return typeof response.data === 'string' ? response.data : '';
  }

  private async fetchFeed(): Promise<RadioQuranFeed> {
    const response = await this.axiosInstance.get<unknown>(this.config.radioQuran.jsonUrl, {
      headers: this.headers(),
    });
    const data: unknown = typeof response.data === 'string' ? JSON.parse(response.data) : response.data;
    if (!isFeed(data)) {
      throw new Error('JSON feed is not an object');
    }
    return data;
  }

  private headers(): Record<string, string> {
    return {
      Accept: '*/*',
      'User-Agent': this.config.http.userAgent,
    };
  }
}

function isFeed(value: unknown): value is RadioQuranFeed {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
