import { StageName, StageOutcome, StageResult } from '../core/types';
import { errorMessage } from '../core/utils';

// A failing stage yields no items and records why; the remaining stages still run.
export const runStage = async <T>(stage: StageName, produce: () => Promise<T[]> | T[]): Promise<StageResult<T>> => {
  try {
    return { stage, ok: true, items: await produce() };
  } catch (err) {
    const cause = errorMessage(err);
    console.error(`Recommendation stage ${stage} failed: ${cause}`);
    return { stage, ok: false, items: [], cause };
  }
};

export const toStageOutcome = <T>(result: StageResult<T>): StageOutcome =>
  result.ok
    ? { stage: result.stage, ok: true, count: result.items.length }
    : { stage: result.stage, ok: false, count: 0, cause: result.cause };
