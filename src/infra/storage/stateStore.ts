import fs from 'node:fs/promises';
import path from 'node:path';
import { AppState } from '../../types.js';
import { createDefaultState } from './defaultState.js';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class StateStore {
  private state: AppState = createDefaultState();
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly stateFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.stateFilePath, 'utf-8');
      this.state = { ...createDefaultState(), ...(JSON.parse(raw) as Partial<AppState>) };
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState();
      await this.persist();
    }
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /**
   * Runs `work` against the live state with exclusive access. Work that throws
   * leaves the state as it was: it operates on a draft that only replaces the
   * live state once it returns.
   */
  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      this.state = draft;
      await this.persist();
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.transaction(() => undefined);
  }

  private async persist(): Promise<void> {
    const tmp = `${this.stateFilePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(this.state, null, 2));
    await fs.rename(tmp, this.stateFilePath);
  }
}
