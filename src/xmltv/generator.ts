/**
 * XMLTV Generator
 * Serializes the normalized guide to XMLTV
 */

import { XMLBuilder } from 'fast-xml-parser';
import { SerializationError } from '../errors';
import type { Channel, EPGDocument, Programme } from '../types/epg';
import { formatXMLTVTime } from '../utils/time';

interface XMLTVChannel {
  '@_id': string;
  'display-name': string;
  icon?: {
    '@_src': string;
  };
}

interface XMLTVProgramme {
  '@_start': string;
  '@_stop'?: string;
  '@_channel': string;
  title: {
    '@_lang': string;
    '#text': string;
  };
  desc?: {
    '@_lang': string;
    '#text': string;
  };
  icon?: {
    '@_src': string;
  };
}

export interface GenerateOptions {
  timezone: string;
  /** Written as the <tv date> attribute when given */
  generatedAt?: number;
  generatorName?: string;
  generatorUrl?: string;
  /** Language of titles and descriptions */
  lang?: string;
}

export class XMLTVGenerator {
  /**
   * Generate the XMLTV document.
   * Channels keep their given order; programmes are grouped by channel in
   * that order and sorted by start within each channel.
   */
  generate(document: EPGDocument, options: GenerateOptions): string {
    const lang = options.lang ?? 'fa';
    const channelIds = new Set(document.channels.map((channel) => channel.id));

    for (const programme of document.programmes) {
      this.assertProgramme(programme, channelIds);
    }

    const channels = document.channels.map((channel) => this.buildChannel(channel));
    const programmes: XMLTVProgramme[] = [];

    for (const channel of document.channels) {
      const own = document.programmes
        .filter((programme) => programme.channelId === channel.id)
        .sort((a, b) => a.start - b.start);

      for (const programme of own) {
        programmes.push(this.buildProgramme(programme, options.timezone, lang));
      }
    }

    const tv: Record<string, unknown> = {
      '@_generator-info-name': options.generatorName ?? 'quran-epg',
    };
    if (options.generatorUrl) {
      tv['@_generator-info-url'] = options.generatorUrl;
    }
    if (options.generatedAt !== undefined) {
      tv['@_date'] = formatXMLTVTime(options.generatedAt, options.timezone);
    }
    tv.channel = channels;
    tv.programme = programmes;

    const xmlObj = {
      '?xml': {
        '@_version': '1.0',
        '@_encoding': 'UTF-8',
      },
      tv,
    };

    const builder = new XMLBuilder({
      ignoreAttributes: false,
      format: true,
      indentBy: '  ',
      suppressEmptyNode: true,
    });

    return builder.build(xmlObj);
  }

  private buildChannel(channel: Channel): XMLTVChannel {
    const element: XMLTVChannel = {
      '@_id': channel.id,
      'display-name': channel.displayName,
    };

    if (channel.icon) {
      element.icon = {
        '@_src': channel.icon,
      };
    }

    return element;
  }

  private buildProgramme(programme: Programme, timezone: string, lang: string): XMLTVProgramme {
    // Attribute order is start, stop, channel
    const element: XMLTVProgramme = {
      '@_start': formatXMLTVTime(programme.start, timezone),
      ...(programme.stop !== undefined ? { '@_stop': formatXMLTVTime(programme.stop, timezone) } : {}),
      '@_channel': programme.channelId,
      title: {
        '@_lang': lang,
        '#text': programme.title,
      },
    };

    if (programme.description) {
      element.desc = {
        '@_lang': lang,
        '#text': programme.description,
      };
    }

    if (programme.icon) {
      element.icon = {
        '@_src': programme.icon,
      };
    }

    return element;
  }

  private assertProgramme(programme: Programme, channelIds: Set<string>): void {
    if (!channelIds.has(programme.channelId)) {
      throw new SerializationError(
        `Programme "${programme.title}" references unknown channel "${programme.channelId}"`
      );
    }
    if (!Number.isFinite(programme.start)) {
      throw new SerializationError(`Programme "${programme.title}" on ${programme.channelId} has no valid start`);
    }
    if (programme.stop !== undefined && !(programme.stop > programme.start)) {
      throw new SerializationError(
        `Programme "${programme.title}" on ${programme.channelId} stops at ${programme.stop}, ` +
          `not after its start ${programme.start}`
      );
    }
  }
}
