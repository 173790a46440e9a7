import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PlayerError } from '../errors/custom-errors.js';
import { makeEpisode } from '../test-fixtures.js';
import { Logger } from '../utils/logger.js';
import { CmdPlayer, type PlayerRunner } from './cmd-player.js';

describe('CmdPlayer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podkeep-player-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should pass the existing local files to the command', async () => {
    const present = join(dir, 'a.mp3');
    await writeFile(present, 'audio');
    const runner = vi.fn<PlayerRunner>(async () => undefined);

    await new CmdPlayer('mpv', runner).play(makeEpisode({ id: 'a', files: [present, join(dir, 'a-2.mp3')] }));

    expect(runner).toHaveBeenCalledWith('mpv', [present], { wait: false });
  });

  it('should refuse episodes without local files', async () => {
    const runner = vi.fn<PlayerRunner>(async () => 0);
    const player = new CmdPlayer('mpv', runner);

    await expect(player.play(makeEpisode({ id: 'a', files: [join(dir, 'gone.mp3')] }))).rejects.toThrow(
      new PlayerError('Episode "Episode a" has no local files'),
    );
    expect(runner).not.toHaveBeenCalled();
  });

  it('should warn about a non-zero exit code when waiting', async () => {
    const present = join(dir, 'a.mp3');
    await writeFile(present, 'audio');
    const warningSpy = vi.spyOn(Logger.prototype, 'warning');
    const runner = vi.fn<PlayerRunner>(async () => 2);

    await new CmdPlayer('vlc', runner).play(makeEpisode({ id: 'a', files: [present] }), { wait: true });

    expect(runner).toHaveBeenCalledWith('vlc', [present], { wait: true });
    expect(warningSpy).toHaveBeenCalledWith('vlc exited with code 2');
  });
});
