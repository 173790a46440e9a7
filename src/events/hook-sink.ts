import { constants } from 'node:fs';
import { access, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { execa } from 'execa';
import { HookError, errorMessage, isErrnoException } from '../errors/custom-errors.js';
import type { SyncEvent } from '../types/event.types.js';
import { logger } from '../utils/logger.js';
import type { EventSink } from './event-sink.js';

const log = logger.child('hooks');

/**
 * Run one hook executable
 *
 * @returns its exit code
 */
export type HookRunner = (executable: string, args: string[], env: Record<string, string>) => Promise<number>;

/**
 * Default runner: no shell, output discarded
 */
export const execaRunner: HookRunner = async (executable, args, env) => {
  const result = await execa(executable, args, {
    env,
    stdio: 'ignore',
    reject: false,
  });
  if (result.exitCode === undefined) {
    throw new HookError(`Hook did not exit normally (signal ${result.signal ?? 'unknown'})`, executable);
  }
  return result.exitCode;
};

/**
 * Command-line arguments a hook receives for an event
 */
export function hookArguments(event: SyncEvent): string[] {
  switch (event.kind) {
    case 'subscription_added':
    case 'subscription_removed':
    case 'subscription_updated':
      return [event.subscriptionName, event.contentDir];
    case 'episode_downloaded':
      return [event.subscriptionName, event.contentDir, ...event.files];
    case 'updates_complete':
      return event.updated.map((subscription) => subscription.subscriptionName);
  }
}

/**
 * Sink that runs every executable in `<hooksDir>/<event kind>/`, in name
 * order, with the event's arguments. Files that are not executable are
 * skipped with a warning; non-zero exit codes are logged as errors.
 */
export class HookSink implements EventSink {
  readonly name = 'hooks';

  constructor(
    private readonly hooksDir: string,
    private readonly runner: HookRunner = execaRunner,
  ) {}

  async handle(event: SyncEvent): Promise<void> {
    const executables = await this.discover(event.kind);
    const args = hookArguments(event);

    for (const executable of executables) {
      const name = basename(executable);
      log.debug(`Run hook ${name} for ${event.kind}`);
      try {
        const exitCode = await this.runner(executable, args, { PODKEEP_EVENT: event.kind });
        if (exitCode === 0) {
          log.debug(`Hook ${name} succeeded on ${event.kind}`);
        } else {
          log.error(`Hook ${name} exited with status ${exitCode} on ${event.kind}`);
        }
      } catch (error) {
        log.error(`Hook ${name} could not be run on ${event.kind}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Executable files for an event kind, sorted by name
   */
  async discover(kind: SyncEvent['kind']): Promise<string[]> {
    const dir = join(this.hooksDir, kind);

    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const executables: string[] = [];
    for (const name of names.sort()) {
      const path = join(dir, name);
      if (await isExecutableFile(path)) {
        executables.push(path);
      } else {
        log.warning(`File ${name} in ${dir} is not executable and will not be run`);
      }
    }
    return executables;
  }
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return false;
    }
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
