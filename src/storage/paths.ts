/**
 * Storage key and URI helpers.
 *
 * Object layout in the bucket:
 *   videos/{namespace}/{fileName}           uploaded bytes
 *   analysis/{videoId}/results.json          normalized analysis result
 *   metadata/videos/{videoId}.json           video record (when persisted)
 *   metadata/analysis/{videoId}.json         analysis job record (when persisted)
 *   data-automation-results/{jobName}/       raw analysis job output
 */

/** A bucket plus a key inside it. */
export interface ObjectLocation {
  readonly bucket: string;
  readonly key: string;
}

/**
 * Builds the upload key for a video.
 *
 * @example
 * buildVideoKey("3f2b...", "clip.mp4")
 * // => "videos/3f2b.../clip.mp4"
 */
export function buildVideoKey(namespace: string, fileName: string): string {
  validateSegment(namespace, 'namespace');
  validateSegment(fileName, 'fileName');
  return `videos/${namespace}/${fileName}`;
}

/** Key of the normalized result document. */
export function buildAnalysisKey(videoId: string): string {
  validateSegment(videoId, 'videoId');
  return `analysis/${videoId}/results.json`;
}

/**
 * Keys tried, in order, when reading a result document back. The first is
 * where results are written; the rest are older layouts still honoured on read.
 */
export function analysisKeyCandidates(videoId: string): string[] {
  validateSegment(videoId, 'videoId');
  return [
    buildAnalysisKey(videoId),
    `analysis-results/${videoId}/results.json`,
    `data-automation-results/${videoId}/results.json`,
    `results/${videoId}/results.json`,
  ];
}

/** Key of the persisted video record. */
export function buildVideoMetadataKey(videoId: string): string {
  validateSegment(videoId, 'videoId');
  return `metadata/videos/${videoId}.json`;
}

/** Key of the persisted analysis job record. */
export function buildAnalysisMetadataKey(videoId: string): string {
  validateSegment(videoId, 'videoId');
  return `metadata/analysis/${videoId}.json`;
}

/** Output prefix for one analysis job, always ending in "/". */
export function buildJobOutputPrefix(jobName: string): string {
  validateSegment(jobName, 'jobName');
  return `data-automation-results/${jobName}/`;
}

/** Formats a location as an s3:// URI. */
export function formatS3Uri(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}

/**
 * Parses an s3:// URI into bucket and key.
 *
 * @example
 * parseS3Uri("s3://my-bucket/videos/abc/clip.mp4")
 * // => { bucket: "my-bucket", key: "videos/abc/clip.mp4" }
 */
export function parseS3Uri(uri: string): ObjectLocation {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);

  if (!match) {
    throw new Error(`Invalid S3 URI: "${uri}"`);
  }

  return { bucket: match[1], key: match[2] };
}

/** Validates that a path segment is non-empty and contains no path traversal. */
function validateSegment(value: string, name: string): void {
  if (!value || value.trim() === '') {
    throw new Error(`${name} must not be empty`);
  }
  if (value.includes('..')) {
    throw new Error(`Path traversal detected: ".." is not allowed in ${name}`);
  }
  if (value.includes('/')) {
    throw new Error(`${name} must not contain "/"`);
  }
}

