import cron from 'node-cron';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { runAliasDecay, startAliasDecayJob } from '../../jobs/decayAliasConfidence';
import { createTestPlayer, createTestStore } from '../helpers';

vi.mock('node-cron', () => ({
  default: {
    schedule: vi.fn(() => ({ stop: vi.fn() })),
  },
}));

describe('alias decay job', () => {
  beforeEach(() => {
    vi.mocked(cron.schedule).mockClear();
  });

  test('runAliasDecay applies the settings at the given time', async () => {
    const { store, clock } = createTestStore();
    const player = await createTestPlayer(store, { name: 'Travis Kelce', team: 'KC', position: 'TE' });
    await store.upsertAlias(player.playerId, 'TK', 'draftkings', 0.8);

    const changed = await runAliasDecay(
      store,
      { halfLifeDays: 30, floor: 0.3 },
      new Date(clock.now().getTime() + 30 * 86_400_000)
    );

    expect(changed).toBe(1);
    const [alias] = await store.listAliases(player.playerId);
    expect(alias.confidenceScore).toBeCloseTo(0.4, 10);
  });

  test('startAliasDecayJob schedules a daily run', async () => {
    const { store } = createTestStore();
    const decay = vi.spyOn(store, 'decayAliasConfidence');

    startAliasDecayJob(store, { halfLifeDays: 90, floor: 0.3 });

    expect(cron.schedule).toHaveBeenCalledTimes(1);
    const [expression, task] = vi.mocked(cron.schedule).mock.calls[0];
    expect(expression).toBe('30 3 * * *');
    if (typeof task !== 'function') throw new Error('expected a scheduled function');

    await task(new Date());

    expect(decay).toHaveBeenCalledWith(expect.objectContaining({ halfLifeDays: 90, floor: 0.3 }));
  });

  test('a failing run is logged, not thrown', async () => {
    const { store } = createTestStore();
    vi.spyOn(store, 'decayAliasConfidence').mockRejectedValue(new Error('database unavailable'));

    startAliasDecayJob(store, { halfLifeDays: 90, floor: 0.3 });
    const [, task] = vi.mocked(cron.schedule).mock.calls[0];
    if (typeof task !== 'function') throw new Error('expected a scheduled function');

    await expect(Promise.resolve(task(new Date()))).resolves.toBeUndefined();
  });
});
