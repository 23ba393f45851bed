import { StageTimeoutError } from '../errors';
import { PipelineStage } from '../types';

export const DEFAULT_STAGE_TIMEOUT_MS = 10_000;

/**
 * Races `work` against a timer. The timer is always cleared, so a settled
 * stage never keeps the process alive. The underlying work is not
 * cancelled; its late result is ignored.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  stage: PipelineStage,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StageTimeoutError(stage, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
