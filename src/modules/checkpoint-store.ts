// ===========================================
// MODULE: CHECKPOINT STORE
// wallet -> newest processed signature, persisted as JSON
// ===========================================

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const checkpointFileSchema = z.record(z.string(), z.string());

export class CheckpointStore {
  private checkpoints: Map<string, string> = new Map();
  private dirty = false;

  constructor(private readonly filePath: string) {}

  /**
   * Load checkpoints from disk. A missing or unreadable file starts empty.
   */
  async load(): Promise<number> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      logger.info({ file: this.filePath, reason: errorMessage(error) }, 'No checkpoint file, starting fresh');
      return 0;
    }

    try {
      const parsed = checkpointFileSchema.parse(JSON.parse(raw));
      this.checkpoints = new Map(Object.entries(parsed));
    } catch (error) {
      logger.warn({ file: this.filePath, error: errorMessage(error) }, 'Ignoring corrupt checkpoint file');
      this.checkpoints = new Map();
    }

    this.dirty = false;
    return this.checkpoints.size;
  }

  get(wallet: string): string | undefined {
    return this.checkpoints.get(wallet);
  }

  set(wallet: string, signature: string): void {
    if (this.checkpoints.get(wallet) === signature) return;
    this.checkpoints.set(wallet, signature);
    this.dirty = true;
  }

  get size(): number {
    return this.checkpoints.size;
  }

  /**
   * Write to disk if anything changed since the last save
   */
  async save(): Promise<boolean> {
    if (!this.dirty) return false;

    try {
      // Write beside the target and rename so a crash never leaves a half-written file
      const tmpPath = `${this.filePath}.tmp`;
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(
        tmpPath,
        JSON.stringify(Object.fromEntries(this.checkpoints), null, 2)
      );
      await fs.promises.rename(tmpPath, this.filePath);
      this.dirty = false;
      logger.debug({ count: this.checkpoints.size }, 'Checkpoints saved');
      return true;
    } catch (error) {
      logger.warn({ file: this.filePath, error: errorMessage(error) }, 'Checkpoint save failed');
      return false;
    }
  }
}
