import { v4 as uuidv4 } from 'uuid';

/** Generates an opaque video identifier (uuid v4). */
export function generateVideoId(): string {
  return uuidv4();
}

/** Generates an opaque conversation session identifier (uuid v4). */
export function generateSessionId(): string {
  return uuidv4();
}

/** Generates a background analysis task identifier (uuid v4). */
export function generateTaskId(): string {
  return uuidv4();
}

/**
 * Generates the namespace segment for an upload key, so two uploads of the
 * same file name never share a key.
 */
export function generateUploadNamespace(): string {
  return uuidv4();
}

/**
 * Generates a unique analysis job name.
 *
 * @example
 * generateJobName()
 * // => "game-analysis-a1b2c3d4-e5f6-4890-abcd-ef1234567890"
 */
export function generateJobName(): string {
  return `game-analysis-${uuidv4()}`;
}
