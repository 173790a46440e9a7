import { once } from 'node:events';
import { execa } from 'execa';
import { PlayerError, errorMessage } from '../errors/custom-errors.js';
import type { Episode } from '../types/episode.types.js';
import { pathExists } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.child('player');

/**
 * Start the player on some files. With `wait` the call resolves with the
 * player's exit code once it quits; otherwise as soon as it has started.
 */
export type PlayerRunner = (
  command: string,
  files: string[],
  options: { wait: boolean },
) => Promise<number | undefined>;

/**
 * Default runner: no shell, output discarded, detached unless waited for
 */
export const execaPlayerRunner: PlayerRunner = async (command, files, { wait }) => {
  const subprocess = execa(command, files, { stdio: 'ignore', detached: !wait, reject: false });

  if (!wait) {
    try {
      await once(subprocess, 'spawn');
    } catch (error) {
      throw new PlayerError(`Cannot start player "${command}": ${errorMessage(error)}`);
    }
    subprocess.unref();
    return undefined;
  }

  const result = await subprocess;
  if (result.exitCode === undefined) {
    throw new PlayerError(`Player "${command}" did not exit normally (signal ${result.signal ?? 'unknown'})`);
  }
  return result.exitCode;
};

/**
 * Plays episodes by running an external command with the episode's local
 * files as arguments
 */
export class CmdPlayer {
  constructor(
    private readonly command: string,
    private readonly runner: PlayerRunner = execaPlayerRunner,
  ) {}

  /**
   * @throws PlayerError if none of the episode's files exist or the player
   *   cannot be started
   */
  async play(episode: Episode, options: { wait?: boolean } = {}): Promise<void> {
    const files: string[] = [];
    for (const file of episode.files) {
      if (await pathExists(file)) {
        files.push(file);
      }
    }
    if (files.length === 0) {
      throw new PlayerError(`Episode "${episode.title}" has no local files`);
    }

    const wait = options.wait ?? false;
    log.debug(`Running ${this.command} ${files.join(' ')}`);
    const exitCode = await this.runner(this.command, files, { wait });
    if (exitCode !== undefined && exitCode !== 0) {
      log.warning(`${this.command} exited with code ${exitCode}`);
    }
  }
}
