/**
 * Internal guide model shared by sources, normalizer and generator
 */

export interface Channel {
  id: string;
  displayName: string;
  icon?: string;
}

/**
 * A schedule item as a source delivers it.
 * Timestamps are epoch milliseconds.
 */
export interface RawScheduleEntry {
  title: string;
  start: number;
  durationMinutes?: number;
  end?: number;
  description?: string;
  image?: string;
}

export interface Programme {
  channelId: string;
  title: string;
  start: number;
  stop?: number;
  description?: string;
  icon?: string;
}

export interface EPGDocument {
  channels: Channel[];
  programmes: Programme[];
}

/**
 * Anything that can produce the raw schedule for one channel
 */
export interface ScheduleSource {
  readonly channel: Channel;
  fetchSchedule(): Promise<RawScheduleEntry[]>;
}
