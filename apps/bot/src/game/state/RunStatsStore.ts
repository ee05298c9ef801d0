import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { RunStats } from './RunStats';

const DEFAULT_FILE = 'run-stats.json';

const PersistedRunStatsSchema = z.object({
  timestamp: z.number(),
  runsAttempted: z.number().int().nonnegative(),
  runsCompleted: z.number().int().nonnegative(),
  laps: z.array(z.number().nonnegative()),
});

export class RunStatsStore {
  readonly filePath: string;

  constructor(filePath?: string) {
    // Defaults to the working directory the bot was started from
    this.filePath = path.resolve(process.cwd(), filePath ?? DEFAULT_FILE);
  }

  async save(stats: RunStats): Promise<boolean> {
    const state = { timestamp: Date.now(), ...stats.toPersisted() };

    try {
      // atomic write (write to temp then rename)
      const tempPath = `${this.filePath}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(state, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
      console.log(`💾 Run stats saved to ${path.basename(this.filePath)}`);
      return true;
    } catch (err) {
      console.error('❌ Failed to save run stats:', err);
      return false;
    }
  }

  async load(): Promise<RunStats | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch {
      console.log('✨ No run stats file found. Starting fresh.');
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      console.warn(`⚠️ Run stats file is not valid JSON, ignoring it:`, err);
      return null;
    }

    const parsed = PersistedRunStatsSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`⚠️ Run stats file has an unexpected shape, ignoring it: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return null;
    }

    console.log(`📂 Run stats loaded (${parsed.data.runsCompleted}/${parsed.data.runsAttempted} runs completed)`);
    return RunStats.fromPersisted(parsed.data);
  }
}
