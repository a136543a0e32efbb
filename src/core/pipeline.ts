import type { AlgorithmName, AlgorithmPayloads, AlgorithmStep, ResultOf, Result, StepType } from './types.js';

export interface Completed<T> {
  data: T;
  message: string;
}

/** Append-only animation log filled while an algorithm runs */
export class StepLog {
  private steps: AlgorithmStep[] = [];

  add(type: StepType, nodeId: number, detail: { fromId?: number; value?: number } = {}): void {
    this.steps.push({ type, nodeId, ...detail });
  }

  get length(): number {
    return this.steps.length;
  }

  toArray(): AlgorithmStep[] {
    return this.steps.slice();
  }
}

/**
 * Runs one algorithm body and wraps its outcome in the uniform result.
 * A failure, reported or thrown, discards the partial step log.
 */
export function runTimed<K extends AlgorithmName>(
  algorithm: K,
  body: (log: StepLog) => Result<Completed<AlgorithmPayloads[K]>>
): ResultOf<K> {
  const started = performance.now();
  const log = new StepLog();
  let outcome: Result<Completed<AlgorithmPayloads[K]>>;
  try {
    outcome = body(log);
  } catch (e) {
    outcome = {
      ok: false,
      code: 'INTERNAL',
      message: `Internal ${algorithm} error: ${e instanceof Error ? e.message : String(e)}`,
    };
  }
  const elapsedMs = performance.now() - started;

  if (outcome.ok) {
    return {
      algorithm,
      success: true,
      elapsedMs,
      data: outcome.value.data,
      steps: log.toArray(),
      message: outcome.value.message,
    };
  }
  return {
    algorithm,
    success: false,
    elapsedMs,
    data: null,
    steps: [],
    code: outcome.code,
    message: outcome.message,
    ...(outcome.hint ? { hint: outcome.hint } : {}),
  };
}
