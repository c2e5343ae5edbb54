import { describe, it, expect, vi } from 'vitest';
import { AqiCategory } from '@airwatch/contracts';
import { TimelineBuilder } from '../src/timeline.js';
import { FakeStore, fixedClock, snapshot } from './fixtures.js';

const clock = fixedClock('2025-01-15T12:00:00Z');

function failingLive() {
  return { fetchIndex: vi.fn(async (): Promise<number> => { throw new Error('upstream down'); }) };
}

describe('TimelineBuilder', () => {
  it('should return contiguous days ending today with weekday names', async () => {
    const builder = new TimelineBuilder({ store: new FakeStore(), live: failingLive(), clock });

    const timeline = await builder.build('Sarajevo');

    expect(timeline.map((entry) => entry.date)).toEqual([
      '2025-01-09',
      '2025-01-10',
      '2025-01-11',
      '2025-01-12',
      '2025-01-13',
      '2025-01-14',
      '2025-01-15',
    ]);
    expect(timeline.map((entry) => entry.weekdayShort)).toEqual([
      'Thu',
      'Fri',
      'Sat',
      'Sun',
      'Mon',
      'Tue',
      'Wed',
    ]);
    expect(timeline[6]?.weekdayLong).toBe('Wednesday');
  });

  it('should fall back to 75 when history and live fetch both fail', async () => {
    const live = failingLive();
    const builder = new TimelineBuilder({ store: new FakeStore(), live, clock });

    const timeline = await builder.build('Sarajevo');

    expect(live.fetchIndex).toHaveBeenCalledWith('Sarajevo');
    expect(timeline.every((entry) => entry.index === 75)).toBe(true);
    expect(timeline[0]?.category).toBe(AqiCategory.Moderate);
    expect(timeline[0]?.color).toBe('#FFFF00');
  });

  it('should seed from the live index when there is no history', async () => {
    const live = { fetchIndex: vi.fn(async () => 42) };
    const builder = new TimelineBuilder({ store: new FakeStore(), live, clock });

    const timeline = await builder.build('Tuzla');

    expect(timeline.map((entry) => entry.index)).toEqual([42, 42, 42, 42, 42, 42, 42]);
  });

  it('should seed from history before the window and average later days', async () => {
    const store = new FakeStore([
      snapshot('Zenica', '2025-01-05T08:00:00Z', 120),
      snapshot('Zenica', '2025-01-11T06:00:00Z', 60),
      snapshot('Zenica', '2025-01-11T18:00:00Z', 71),
      snapshot('Zenica', '2025-01-14T09:00:00Z', 180),
    ]);
    const live = failingLive();
    const builder = new TimelineBuilder({ store, live, clock });

    const timeline = await builder.build('Zenica');

    expect(timeline.map((entry) => entry.index)).toEqual([120, 120, 66, 66, 66, 180, 180]);
    expect(timeline[5]?.category).toBe(AqiCategory.Unhealthy);
    expect(live.fetchIndex).not.toHaveBeenCalled();
  });

  it('should ignore samples of other targets and inside-window samples when seeding', async () => {
    const store = new FakeStore([
      snapshot('Mostar', '2025-01-05T08:00:00Z', 150),
      snapshot('Tuzla', '2025-01-09T08:00:00Z', 20),
      snapshot('Tuzla', '2025-01-10T08:00:00Z', 30),
    ]);
    const builder = new TimelineBuilder({ store, live: failingLive(), clock });

    const timeline = await builder.build('Tuzla');

    expect(timeline.map((entry) => entry.index)).toEqual([20, 30, 30, 30, 30, 30, 30]);
  });

  it('should not seed when the first day has samples', async () => {
    const store = new FakeStore([snapshot('Bihac', '2025-01-09T00:00:00Z', 33)]);
    const getLatest = vi.spyOn(store, 'getLatest');
    const live = failingLive();
    const builder = new TimelineBuilder({ store, live, clock });

    const timeline = await builder.build('Bihac');

    expect(timeline.every((entry) => entry.index === 33)).toBe(true);
    expect(getLatest).not.toHaveBeenCalled();
    expect(live.fetchIndex).not.toHaveBeenCalled();
  });

  it('should treat a failed day read as a gap', async () => {
    const store = new FakeStore([
      snapshot('Travnik', '2025-01-09T10:00:00Z', 40),
      snapshot('Travnik', '2025-01-12T10:00:00Z', 140),
      snapshot('Travnik', '2025-01-13T10:00:00Z', 90),
    ]);
    store.failRange = (from) => from === Date.parse('2025-01-12T00:00:00Z');
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const builder = new TimelineBuilder({ store, live: failingLive(), clock, logger });

    const timeline = await builder.build('Travnik');

    expect(timeline.map((entry) => entry.index)).toEqual([40, 40, 40, 40, 90, 90, 90]);
    expect(logger.warn).toHaveBeenCalledWith('Timeline day read failed', {
      target: 'Travnik',
      date: '2025-01-12',
      error: 'Error: range read failed',
    });
  });

  it('should fall through a failing history read to the live index', async () => {
    const store = new FakeStore();
    store.failLatest = true;
    const builder = new TimelineBuilder({ store, live: { fetchIndex: async () => 88.5 }, clock });

    await expect(builder.seed('Sarajevo', Date.parse('2025-01-09T00:00:00Z'))).resolves.toEqual({
      index: 89,
      source: 'live',
    });
  });

  it('should reject an out-of-range live index in favour of the default', async () => {
    const builder = new TimelineBuilder({
      store: new FakeStore(),
      live: { fetchIndex: async () => -5 },
      clock,
      defaultIndex: 60,
    });

    await expect(builder.seed('Sarajevo', 0)).resolves.toEqual({ index: 60, source: 'default' });
  });

  it('should honour custom window lengths', async () => {
    const builder = new TimelineBuilder({ store: new FakeStore(), live: failingLive(), clock });

    const timeline = await builder.build('Sarajevo', 3);
    const single = await builder.build('Sarajevo', 0);

    expect(timeline.map((entry) => entry.date)).toEqual(['2025-01-13', '2025-01-14', '2025-01-15']);
    expect(single.map((entry) => entry.date)).toEqual(['2025-01-15']);
  });

  it('should use the default window for a non-numeric length', async () => {
    const builder = new TimelineBuilder({ store: new FakeStore(), live: failingLive(), clock });

    const unparsed = await builder.build('Sarajevo', Number.parseInt('abc', 10));
    const unbounded = await builder.buildView('Sarajevo', Number.POSITIVE_INFINITY);

    expect(unparsed.map((entry) => entry.date)).toEqual([
      '2025-01-09',
      '2025-01-10',
      '2025-01-11',
      '2025-01-12',
      '2025-01-13',
      '2025-01-14',
      '2025-01-15',
    ]);
    expect(unbounded.period).toBe('Last 7 days');
  });

  it('should label the view with its period', async () => {
    const builder = new TimelineBuilder({ store: new FakeStore(), live: failingLive(), clock });

    const view = await builder.buildView('Mostar');

    expect(view.target).toBe('Mostar');
    expect(view.period).toBe('Last 7 days');
    expect(view.days).toHaveLength(7);
  });
});
