/**
 * Sepehr EPG API response types
 * GET /v3/epg/tvprogram?channel_id=..&date=YYYY-MM-DD
 */

export interface SepehrProgramme {
  id?: number;
  seriesId?: number;
  start?: number; // epoch ms
  duration?: number; // minutes
  channelId?: number;
  title?: string;
  descSummary?: string | null;
  descFull?: string | null;
  imageUrl?: string | null;
  [key: string]: unknown;
}

export interface SepehrEPGResponse {
  list?: SepehrProgramme[];
  [key: string]: unknown;
}
