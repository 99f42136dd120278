import type { Channel } from '../types/epg';

export const QURAN_TV: Channel = {
  id: 'QuranTV.ir@SD',
  displayName: 'IRIB Quran',
  icon: 'https://lb-cdn.sepehrtv.ir/img/channel/quarnlogo.png',
};

export const RADIO_QURAN: Channel = {
  id: 'Radio Quran',
  displayName: 'Radio Quran',
  icon: 'https://logoyab.com/wp-content/uploads/2024/08/Radio-Quran-Logo.png',
};

// Order of the <channel> elements in the guide
export const CHANNELS: readonly Channel[] = [QURAN_TV, RADIO_QURAN];
