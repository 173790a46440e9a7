import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { execa } from 'execa';
import * as yaml from 'js-yaml';
import { type SubscriptionFile, SubscriptionFileSchema, parseWithSchema } from '../config/config-schema.js';
import { ConfigError, PodkeepError, errorMessage } from '../errors/custom-errors.js';
import type { SubscriptionStore } from '../store/subscription-store.js';
import type { SubscriptionChanges } from '../types/subscription.types.js';
import { logger } from '../utils/logger.js';

const log = logger.child('editor');

/**
 * Open a file in an interactive editor and resolve once it is closed
 */
export type EditorRunner = (file: string) => Promise<void>;

/**
 * Editor command from `$EDITOR`, then `$VISUAL`, else `vi`
 */
export function editorCommand(env: NodeJS.ProcessEnv = process.env): string[] {
  const editor = env.EDITOR?.trim() || env.VISUAL?.trim() || 'vi';
  return editor.split(/\s+/);
}

/**
 * Default runner: the editor shares the terminal
 */
export const execaEditorRunner: EditorRunner = async (file) => {
  const [command = 'vi', ...args] = editorCommand();
  const result = await execa(command, [...args, file], { stdio: 'inherit', reject: false });
  if (result.exitCode !== 0) {
    throw new PodkeepError(`Editor "${command}" exited with code ${result.exitCode ?? 'unknown'}`);
  }
};

/**
 * Changes that turn `before` into `after`. Settings removed in `after`
 * reset to their defaults.
 */
export function definitionChanges(before: SubscriptionFile, after: SubscriptionFile): SubscriptionChanges {
  const changes: SubscriptionChanges = {};
  if (after.feedUrl !== before.feedUrl) changes.feedUrl = after.feedUrl;
  if (after.title !== before.title) changes.title = after.title ?? null;
  if (after.contentDir !== before.contentDir) changes.contentDir = after.contentDir ?? null;
  if (after.filenameTemplate !== before.filenameTemplate) changes.filenameTemplate = after.filenameTemplate ?? null;
  if (after.maxEpisodes !== before.maxEpisodes) changes.maxEpisodes = after.maxEpisodes ?? null;
  if ((after.enabled ?? true) !== (before.enabled ?? true)) changes.enabled = after.enabled ?? true;
  return changes;
}

/**
 * Write a subscription's definition to a temporary YAML file, let the user
 * edit it and read back what changed
 *
 * @returns undefined when the file was saved unchanged
 * @throws ConfigError if the edited file is not a valid definition
 */
export async function editDefinition(
  store: SubscriptionStore,
  name: string,
  runEditor: EditorRunner = execaEditorRunner,
): Promise<SubscriptionChanges | undefined> {
  const before = await store.getDefinition(name);
  const dir = await mkdtemp(join(tmpdir(), 'podkeep-edit-'));
  const file = join(dir, `${name}.yaml`);

  try {
    const original = yaml.dump(before, { skipInvalid: true });
    await writeFile(file, original, 'utf-8');
    log.debug(`Editing ${file}`);
    await runEditor(file);

    const edited = await readFile(file, 'utf-8');
    if (edited === original) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = yaml.load(edited);
    } catch (error) {
      throw new ConfigError(`Failed to parse edited YAML: ${errorMessage(error)}`);
    }
    const after = parseWithSchema(SubscriptionFileSchema, raw ?? {}, `edited subscription "${name}"`);
    return definitionChanges(before, after);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
