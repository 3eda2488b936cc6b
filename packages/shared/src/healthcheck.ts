import { writeFile } from 'node:fs/promises';
import { createLogger } from './logger';

const DEFAULT_PATH = '/tmp/.worker-healthy';

const logger = createLogger({ name: 'healthcheck' });

export async function touchHealthFile(path: string = DEFAULT_PATH): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

export function startHealthBeat(
  intervalMs: number = 5000,
  path: string = DEFAULT_PATH,
): { stop: () => void } {
  const tick = () => {
    touchHealthFile(path).catch((err: unknown) => {
      logger.warn({ path, err: err instanceof Error ? err.message : String(err) }, 'Health file write failed');
    });
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  return {
    stop: () => clearInterval(timer),
  };
}
