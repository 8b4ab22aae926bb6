/**
 * Background analysis tasks.
 *
 * A task wraps one in-flight promise and exposes its state and a join()
 * handle. Tasks cannot be cancelled: once dispatched, the external job and
 * its bookkeeping run to completion.
 */

import { errorMessage } from '../utils/errors.ts';
import { generateTaskId } from '../utils/ids.ts';
import { logError, logInfo } from '../utils/log.ts';

export type TaskState = 'running' | 'succeeded' | 'failed';

/** Read-only view of a task. */
export interface AnalysisTaskSnapshot {
  readonly taskId: string;
  readonly videoId: string;
  readonly state: TaskState;
  readonly startedAt: string;
  readonly finishedAt: string | null;
  readonly error: string | null;
}

export class AnalysisTask {
  readonly taskId: string;
  readonly videoId: string;
  readonly startedAt: string;
  private currentState: TaskState = 'running';
  private finishedAtValue: string | null = null;
  private errorValue: string | null = null;
  private readonly settled: Promise<void>;

  constructor(taskId: string, videoId: string, work: () => Promise<unknown>) {
    this.taskId = taskId;
    this.videoId = videoId;
    this.startedAt = new Date().toISOString();

    this.settled = Promise.resolve()
      .then(work)
      .then(
        () => {
          this.finish('succeeded', null);
        },
        (error: unknown) => {
          this.finish('failed', errorMessage(error));
        },
      );
  }

  get state(): TaskState {
    return this.currentState;
  }

  /** Resolves once the task has finished, whether it succeeded or failed. Never rejects. */
  join(): Promise<void> {
    return this.settled;
  }

  snapshot(): AnalysisTaskSnapshot {
    return {
      taskId: this.taskId,
      videoId: this.videoId,
      state: this.currentState,
      startedAt: this.startedAt,
      finishedAt: this.finishedAtValue,
      error: this.errorValue,
    };
  }

  private finish(state: TaskState, error: string | null): void {
    this.currentState = state;
    this.finishedAtValue = new Date().toISOString();
    this.errorValue = error;

    if (state === 'failed') {
      logError('analysis_task_failed', { task_id: this.taskId, video_id: this.videoId, error });
    } else {
      logInfo('analysis_task_succeeded', { task_id: this.taskId, video_id: this.videoId });
    }
  }
}

/** Finished tasks kept for lookup before the oldest are dropped. */
export const MAX_SETTLED_TASKS = 100;

/**
 * Registry of dispatched tasks, constructed once and handed to the app.
 * Running tasks are always kept; finished ones are pruned oldest first
 * once more than `maxSettled` accumulate.
 */
export class AnalysisTaskManager {
  private readonly tasks = new Map<string, AnalysisTask>();

  constructor(private readonly maxSettled: number = MAX_SETTLED_TASKS) {}

  /** Starts `work` in the background and returns its handle immediately. */
  dispatch(videoId: string, work: () => Promise<unknown>): AnalysisTask {
    this.prune();
    const task = new AnalysisTask(generateTaskId(), videoId, work);
    this.tasks.set(task.taskId, task);
    logInfo('analysis_task_dispatched', { task_id: task.taskId, video_id: videoId });
    return task;
  }

  find(taskId: string): AnalysisTask | null {
    return this.tasks.get(taskId) ?? null;
  }

  /** Tasks still running. */
  running(): AnalysisTask[] {
    return [...this.tasks.values()].filter((task) => task.state === 'running');
  }

  private prune(): void {
    const settled = [...this.tasks.values()].filter((task) => task.state !== 'running');
    const excess = settled.length - this.maxSettled;
    for (const task of settled.slice(0, Math.max(0, excess))) {
      this.tasks.delete(task.taskId);
    }
  }

  /** Waits for every task dispatched so far. */
  async joinAll(): Promise<void> {
    await Promise.all([...this.tasks.values()].map((task) => task.join()));
  }
}
