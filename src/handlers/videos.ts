/**
 * GET /api/videos handler.
 *
 * Returns a paginated list of tracked videos, newest upload first,
 * optionally filtered by status.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';
import type { Pagination, VideoListResponse } from '../types/api.ts';
import { VideoListQuerySchema, parseRequest } from '../utils/validation.ts';
import { queryParams } from './request.ts';

export async function handleListVideos(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const query = parseRequest(VideoListQuerySchema, queryParams(c), 'Invalid query parameters');

  const page = deps.videos.list({
    status: query.status,
    limit: query.limit,
    offset: query.offset,
  });

  const pagination: Pagination = {
    limit: query.limit,
    offset: query.offset,
    total: page.total,
  };

  const response: VideoListResponse = { videos: page.videos, pagination };
  return c.json(response, 200);
}
