import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { StepTrace } from '../types/step-result.js';

/** Append-only JSONL trace of every executed step, one file per run. */
export class RunLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logStep(trace: StepTrace): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...trace,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  getLogPath(): string {
    return this.logPath;
  }
}
