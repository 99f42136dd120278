import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SepehrClient } from '../api/sepehr-client';
import { StaticAuthorization } from '../auth/authorization';
import { QURAN_TV, RADIO_QURAN } from '../epg/channels';
import { FetchError } from '../errors';
import type { Channel, RawScheduleEntry, ScheduleSource } from '../types/epg';
import { EPGUpdater } from '../updater/epg-updater';
import { validateXMLTV } from '../xmltv/validator';
import { makeConfig } from './helpers/config';
import { createStubHttp } from './helpers/stub-http';

const MINUTE = 60 * 1000;
const BASE = Date.UTC(2026, 1, 19);
const NOW = Date.UTC(2026, 1, 19, 10, 0);

class FakeSource implements ScheduleSource {
  constructor(
    readonly channel: Channel,
    private readonly result: RawScheduleEntry[] | Error
  ) {}

  async fetchSchedule(): Promise<RawScheduleEntry[]> {
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

function threeEntries(prefix: string): RawScheduleEntry[] {
  return [
    { title: `${prefix} 1`, start: BASE, durationMinutes: 30 },
    { title: `${prefix} 2`, start: BASE + 30 * MINUTE },
    { title: `${prefix} 3`, start: BASE + 60 * MINUTE },
  ];
}

describe('EPGUpdater', () => {
  let directory: string;
  let output: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'quran-epg-'));
    output = path.join(directory, 'epg.xml');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  function updater(sources: ScheduleSource[]): EPGUpdater {
    return new EPGUpdater(makeConfig({ output: { filename: output } }), sources, () => NOW);
  }

  it('writes the guide for both channels', async () => {
    const result = await updater([
      new FakeSource(QURAN_TV, threeEntries('TV')),
      new FakeSource(RADIO_QURAN, threeEntries('Radio')),
    ]).update();

    expect(result.success).toBe(true);
    expect(result.channels).toEqual([
      { channelId: 'QuranTV.ir@SD', programmes: 3, failed: false },
      { channelId: 'Radio Quran', programmes: 3, failed: false },
    ]);

    const xml = await fs.readFile(output, 'utf-8');
    expect(validateXMLTV(xml)).toEqual({ valid: true, channels: 2, programmes: 6 });
    expect(xml).toContain('<programme start="20260219000000 +0000" stop="20260219003000 +0000" channel="QuranTV.ir@SD">');
    expect(xml).toContain('<programme start="20260219010000 +0000" channel="Radio Quran">');
    expect(await fs.readdir(directory)).toEqual(['epg.xml']);
  });

  it('stamps the configured generator on the guide', async () => {
    const config = makeConfig({
      output: { filename: output },
      xmltv: { generatorName: 'quran-epg', generatorUrl: 'https://example.test/epg', lang: 'fa' },
    });

    await new EPGUpdater(config, [new FakeSource(RADIO_QURAN, threeEntries('Radio'))], () => NOW).update();

    const xml = await fs.readFile(output, 'utf-8');
    expect(xml).toContain(
      '<tv generator-info-name="quran-epg" generator-info-url="https://example.test/epg" date="20260219100000 +0000">'
    );
    expect(xml).toContain('<title lang="fa">Radio 1</title>');
  });

  it('publishes the remaining channel when one source fails', async () => {
    const result = await updater([
      new FakeSource(QURAN_TV, new FetchError(QURAN_TV.id, 'HTTP 401')),
      new FakeSource(RADIO_QURAN, threeEntries('Radio')),
    ]).update();

    expect(result.success).toBe(true);
    expect(result.channels[0]).toEqual({ channelId: 'QuranTV.ir@SD', programmes: 0, failed: true });

    const xml = await fs.readFile(output, 'utf-8');
    expect(validateXMLTV(xml)).toEqual({ valid: true, channels: 2, programmes: 3 });
  });

  it('publishes radio when the TV feed carries malformed items', async () => {
    const config = makeConfig({ output: { filename: output } });
    const { http } = createStubHttp(() => ({
      status: 200,
      data: { list: [{ start: BASE, title: 'Ok' }, null, { start: BASE + MINUTE, title: 7 }] },
    }));
    const tv = new SepehrClient(config, QURAN_TV, new StaticAuthorization('Bearer test-token'), http, () => NOW);

    const result = await new EPGUpdater(config, [tv, new FakeSource(RADIO_QURAN, threeEntries('Radio'))], () => NOW).update();

    expect(result.success).toBe(true);
    expect(result.channels).toEqual([
      { channelId: 'QuranTV.ir@SD', programmes: 1, failed: false },
      { channelId: 'Radio Quran', programmes: 3, failed: false },
    ]);
    expect(validateXMLTV(await fs.readFile(output, 'utf-8'))).toEqual({ valid: true, channels: 2, programmes: 4 });
  });

  it('keeps the previous guide when every source fails', async () => {
    await fs.writeFile(output, 'previous guide', 'utf-8');

    const result = await updater([
      new FakeSource(QURAN_TV, new FetchError(QURAN_TV.id, 'HTTP 401')),
      new FakeSource(RADIO_QURAN, new FetchError(RADIO_QURAN.id, 'timeout')),
    ]).update();

    expect(result.success).toBe(false);
    expect(result.error).toBe('FetchError: all channels: every schedule source failed');
    expect(await fs.readFile(output, 'utf-8')).toBe('previous guide');
  });

  it('writes nothing when both channels are empty', async () => {
    const result = await updater([new FakeSource(QURAN_TV, []), new FakeSource(RADIO_QURAN, [])]).update();

    expect(result.success).toBe(false);
    expect(result.error).toBe('EmptyResultError: No programmes from any source, keeping the previous guide');
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('fails the run on unexpected errors from a source', async () => {
    const result = await updater([
      new FakeSource(QURAN_TV, new TypeError('boom')),
      new FakeSource(RADIO_QURAN, threeEntries('Radio')),
    ]).update();

    expect(result.success).toBe(false);
    expect(result.error).toBe('TypeError: boom');
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('creates the output directory when missing', async () => {
    output = path.join(directory, 'public', 'epg.xml');

    const result = await updater([new FakeSource(QURAN_TV, threeEntries('TV'))]).update();

    expect(result.success).toBe(true);
    expect(validateXMLTV(await fs.readFile(output, 'utf-8')).programmes).toBe(3);
  });
});
