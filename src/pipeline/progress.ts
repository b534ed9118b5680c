import type { ProgressObserver } from '../fetch/fetcher.js';
import { logger } from '../shared/logger.js';

/** Logs `<label> n/total` as each fetch completes. */
export function progressLogger(label: string, stage: string): ProgressObserver {
  return ({ completed, total, result }) => {
    logger.info(
      { recipe: label, stage, url: result.key, ok: result.error === null },
      `${label} ${stage} ${completed}/${total}`,
    );
  };
}
