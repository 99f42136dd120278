import { normalizeSchedule } from '../epg/normalizer';
import type { RawScheduleEntry } from '../types/epg';

const MINUTE = 60 * 1000;
const BASE = Date.UTC(2026, 1, 19, 0, 0);

describe('normalizeSchedule', () => {
  it('infers each stop from the next start and leaves the last one open', () => {
    const entries: RawScheduleEntry[] = [
      { title: 'Tafsir', start: BASE },
      { title: 'Tilawa', start: BASE + 30 * MINUTE },
      { title: 'News', start: BASE + 45 * MINUTE },
    ];

    const programmes = normalizeSchedule('ch', entries);

    expect(programmes.map((p) => p.stop)).toEqual([BASE + 30 * MINUTE, BASE + 45 * MINUTE, undefined]);
    expect(programmes[2]).not.toHaveProperty('stop');
  });

  it('uses explicit durations for every entry that has one', () => {
    const entries: RawScheduleEntry[] = [
      { title: 'A', start: BASE, durationMinutes: 20 },
      { title: 'B', start: BASE + 30 * MINUTE, durationMinutes: 10 },
      { title: 'C', start: BASE + 60 * MINUTE },
    ];

    const programmes = normalizeSchedule('ch', entries);

    expect(programmes[0].stop).toBe(BASE + 20 * MINUTE);
    expect(programmes[1].stop).toBe(BASE + 40 * MINUTE);
    expect(programmes[2].stop).toBeUndefined();
  });

  it('prefers an explicit duration over the next start', () => {
    const programmes = normalizeSchedule('ch', [
      { title: 'A', start: BASE, durationMinutes: 60 },
      { title: 'B', start: BASE + 30 * MINUTE },
    ]);

    expect(programmes[0].stop).toBe(BASE + 60 * MINUTE);
  });

  it('accepts an explicit end timestamp', () => {
    const programmes = normalizeSchedule('ch', [{ title: 'A', start: BASE, end: BASE + 5 * MINUTE }]);
    expect(programmes[0].stop).toBe(BASE + 5 * MINUTE);
  });

  it('ignores an explicit end that is not after the start', () => {
    const programmes = normalizeSchedule('ch', [
      { title: 'A', start: BASE, end: BASE },
      { title: 'B', start: BASE + 15 * MINUTE },
    ]);
    expect(programmes[0].stop).toBe(BASE + 15 * MINUTE);
  });

  it('does not infer a stop from an entry with the same start', () => {
    const programmes = normalizeSchedule('ch', [
      { title: 'A', start: BASE },
      { title: 'B', start: BASE },
    ]);
    expect(programmes[0].stop).toBeUndefined();
  });

  it('sorts by start and keeps stops after starts', () => {
    const programmes = normalizeSchedule('ch', [
      { title: 'Late', start: BASE + 90 * MINUTE },
      { title: 'Early', start: BASE },
      { title: 'Middle', start: BASE + 30 * MINUTE, durationMinutes: 30 },
    ]);

    expect(programmes.map((p) => p.title)).toEqual(['Early', 'Middle', 'Late']);
    for (let i = 1; i < programmes.length; i++) {
      expect(programmes[i].start).toBeGreaterThanOrEqual(programmes[i - 1].start);
    }
    for (const programme of programmes) {
      if (programme.stop !== undefined) {
        expect(programme.stop).toBeGreaterThan(programme.start);
      }
    }
  });

  it('drops entries without a title or a valid start', () => {
    const programmes = normalizeSchedule('ch', [
      { title: '   ', start: BASE },
      { title: 'Broken', start: Number.NaN },
      { title: 'Kept', start: BASE + MINUTE },
    ]);
    expect(programmes.map((p) => p.title)).toEqual(['Kept']);
  });

  it('carries channel, description and icon', () => {
    const [programme] = normalizeSchedule('QuranTV.ir@SD', [
      { title: ' Tafsir ', start: BASE, description: ' Surah Yasin ', image: 'https://img.test/1.jpg' },
    ]);

    expect(programme).toEqual({
      channelId: 'QuranTV.ir@SD',
      title: 'Tafsir',
      start: BASE,
      description: 'Surah Yasin',
      icon: 'https://img.test/1.jpg',
    });
  });

  it('returns an empty list for no entries', () => {
    expect(normalizeSchedule('ch', [])).toEqual([]);
  });
});
