/**
 * File-backed storage for one persisted intent model.
 *
 * Writes go to a temp file in the target directory followed by a rename,
 * so a concurrent reader sees either the old model or the new one.
 * A missing file is not an error: load() returns null and the caller
 * decides how to report it.
 */

import { readFile, writeFile, rename, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { IntentModel } from './intent-model.js';
import type { IntentModelOptions } from './intent-model.js';

export const DEFAULT_MODEL_PATH = 'models/intent-model.json';

export class ModelStore {
  readonly modelPath: string;

  constructor(modelPath: string = DEFAULT_MODEL_PATH) {
    this.modelPath = modelPath;
  }

  /**
   * Restore the stored model.
   *
   * @returns The model, or null when no model file exists
   * @throws {CorruptModelError} When the file exists but is invalid
   */
  async load(options?: Partial<IntentModelOptions>): Promise<IntentModel | null> {
    let content: string;
    try {
      content = await readFile(this.modelPath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    return IntentModel.restore(content, options);
  }

  /**
   * Persist a trained model atomically.
   *
   * @throws {NotTrainedError} When the model is untrained
   */
  async save(model: IntentModel): Promise<void> {
    const blob = model.persist();
    await mkdir(dirname(this.modelPath), { recursive: true });

    const tempPath = join(
      dirname(this.modelPath),
      `.intent-model-${Date.now()}-${Math.random().toString(36).slice(2)}.json.tmp`,
    );

    await writeFile(tempPath, blob, 'utf-8');
    await rename(tempPath, this.modelPath);
  }
}
