/**
 * POST /api/video/upload-url handler.
 *
 * Issues a one-hour presigned PUT URL for a fresh key and registers the
 * video in status "uploaded". The client uploads straight to storage.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';
import type { UploadUrlResponse } from '../types/api.ts';
import { UploadUrlRequestSchema, parseRequest } from '../utils/validation.ts';
import { UPLOAD_URL_TTL_SECONDS } from '../storage/object-store.ts';
import { buildVideoKey, formatS3Uri } from '../storage/paths.ts';
import { persistVideoRecord } from '../analysis/pipeline.ts';
import { generateUploadNamespace, generateVideoId } from '../utils/ids.ts';
import { logInfo } from '../utils/log.ts';
import { readJsonBody } from './request.ts';

export async function handleCreateUploadUrl(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const body = parseRequest(UploadUrlRequestSchema, await readJsonBody(c), 'Invalid request body');

  const key = buildVideoKey(generateUploadNamespace(), body.fileName);
  const uploadUrl = await deps.store.createUploadUrl(key, body.contentType, UPLOAD_URL_TTL_SECONDS);
  const s3Uri = formatS3Uri(deps.store.bucket, key);

  const record = deps.videos.create({
    videoId: generateVideoId(),
    fileName: body.fileName,
    contentType: body.contentType,
    s3Uri,
    s3Key: key,
  });
  await persistVideoRecord(deps, record);

  logInfo('upload_url_issued', { video_id: record.videoId, s3_uri: s3Uri });

  const response: UploadUrlResponse = { uploadUrl, s3Uri, videoId: record.videoId };
  return c.json(response, 200);
}
