/**
 * EPG Update Orchestrator
 * Coordinates fetching, normalization, XMLTV generation, validation and file writing
 */

import { promises as fs } from 'fs';
import path from 'path';
import { normalizeSchedule } from '../epg/normalizer';
import { EmptyResultError, FetchError, SerializationError } from '../errors';
import type { AppConfig } from '../types/config';
import type { Programme, ScheduleSource } from '../types/epg';
import { XMLTVGenerator } from '../xmltv/generator';
import { validateXMLTV } from '../xmltv/validator';

export interface ChannelCount {
  channelId: string;
  programmes: number;
  failed: boolean;
}

export interface UpdateResult {
  success: boolean;
  message: string;
  error?: string;
  channels: ChannelCount[];
}

export class EPGUpdater {
  private readonly config: AppConfig;
  private readonly sources: ScheduleSource[];
  private readonly now: () => number;

  constructor(config: AppConfig, sources: ScheduleSource[], now: () => number = Date.now) {
    this.config = config;
    this.sources = sources;
    this.now = now;
  }

  /**
   * Perform a complete EPG update.
   * The output file is only replaced once the whole document is built and validated.
   */
  async update(): Promise<UpdateResult> {
    const startTime = Date.now();
    const counts: ChannelCount[] = [];

    try {
      console.log('========== EPG Update Started ==========');
      console.log(`Time: ${new Date(this.now()).toISOString()}`);

      // Step 1: Fetch and normalize every channel
      console.log(`\n[1/3] Fetching schedules for ${this.sources.length} channels...`);
      const programmes: Programme[] = [];

      for (const source of this.sources) {
        const { channel } = source;
        console.log(`\n${channel.displayName} (${channel.id}):`);

        try {
          const entries = await source.fetchSchedule();
          const normalized = normalizeSchedule(channel.id, entries);
          programmes.push(...normalized);
          counts.push({ channelId: channel.id, programmes: normalized.length, failed: false });
          console.log(`  ${normalized.length} programmes`);
        } catch (error) {
          if (!(error instanceof FetchError)) {
            throw error;
          }
          counts.push({ channelId: channel.id, programmes: 0, failed: true });
          console.warn(`  FAILED: ${error.message}`);
        }
      }

      if (this.sources.length > 0 && counts.every((count) => count.failed)) {
        throw new FetchError('all channels', 'every schedule source failed');
      }

      if (programmes.length === 0) {
        throw new EmptyResultError('No programmes from any source, keeping the previous guide');
      }

      // Step 2: Generate XMLTV
      console.log('\n[2/3] Generating XMLTV...');
      const generator = new XMLTVGenerator();
      const xmlContent = generator.generate(
        { channels: this.sources.map((source) => source.channel), programmes },
        {
          timezone: this.config.timezone,
          generatedAt: this.now(),
          generatorName: this.config.xmltv.generatorName,
          generatorUrl: this.config.xmltv.generatorUrl,
          lang: this.config.xmltv.lang,
        }
      );
      console.log(`Generated XML (${Math.round(Buffer.byteLength(xmlContent) / 1024)} KB)`);

      const validationResult = validateXMLTV(xmlContent);
      if (!validationResult.valid) {
        throw new SerializationError(`XML validation failed: ${validationResult.error}`);
      }
      console.log('XML validation passed');

      // Step 3: Write
      console.log('[3/3] Writing EPG file...');
      await this.writeEPGFile(xmlContent);

      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      console.log('\n========== EPG Update Completed ==========');
      for (const count of counts) {
        console.log(`  ${count.channelId}: ${count.failed ? 'FAILED' : `${count.programmes} programmes`}`);
      }
      console.log(`Wrote ${programmes.length} programmes to ${this.config.output.filename} in ${duration}s`);

      return {
        success: true,
        message: `EPG update completed successfully in ${duration}s`,
        channels: counts,
      };
    } catch (error) {
      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      console.error('\n========== EPG Update Failed ==========');
      console.error(`Duration: ${duration} seconds`);
      console.error('Error:', error);

      return {
        success: false,
        message: `EPG update failed after ${duration}s`,
        error: String(error),
        channels: counts,
      };
    }
  }

  /**
   * Write the EPG file atomically: temp file, then rename over the target
   */
  private async writeEPGFile(content: string): Promise<void> {
    const target = this.config.output.filename;
    const directory = path.dirname(target);
    const tempPath = `${target}.tmp`;

    await fs.mkdir(directory, { recursive: true });

    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new Error(`Failed to write EPG file ${target}: ${error}`, { cause: error });
    }
  }
}
