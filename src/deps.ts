/**
 * Collaborators handed to createApp and read by handlers via c.get('deps').
 */

import type { AppConfig } from './env.ts';
import type { ObjectStore } from './storage/object-store.ts';
import type { VideoStore } from './storage/video-store.ts';
import type { SessionStore } from './storage/session-store.ts';
import type { DataAutomationClient } from './automation/client.ts';
import type { ConversationalAgent } from './agent/agent.ts';
import type { AnalysisTaskManager } from './analysis/tasks.ts';
import type { Sleep } from './analysis/poller.ts';

export interface AppDeps {
  readonly config: AppConfig;
  readonly store: ObjectStore;
  readonly videos: VideoStore;
  readonly sessions: SessionStore;
  readonly tasks: AnalysisTaskManager;
  readonly automation: DataAutomationClient;
  /** Null when no agent id is configured. */
  readonly agent: ConversationalAgent | null;
  /** Wait between job polls; defaults to a real timer. */
  readonly sleep?: Sleep;
}

/** Hono environment shared by the app and every handler. */
export interface AppEnv {
  Variables: {
    deps: AppDeps;
  };
}
