/**
 * radioquran.ir schedule shapes
 */

/** One programme as read from either the conductor page or the JSON feed */
export interface RadioQuranItem {
  time: string; // HH:MM
  title: string;
  description: string;
  duration: number; // minutes, 0 when unknown
  image: string;
}

export interface RadioQuranFeedBox {
  title?: string;
  time?: string;
  image?: string;
  [key: string]: unknown;
}

export interface RadioQuranFeed {
  Containers?: Array<{
    boxes?: RadioQuranFeedBox[];
    [key: string]: unknown;
  }>;
  [key: string]: unknown;
}
