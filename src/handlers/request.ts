import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';
import { NotFoundError, ValidationError } from '../utils/errors.ts';

/**
 * Reads a JSON request body. An empty body reads as {} so endpoints with
 * optional bodies need no special case.
 *
 * @throws ValidationError when the body is not valid JSON
 */
export async function readJsonBody(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();

  if (text.trim() === '') {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

/** Query string as a plain object; repeated keys keep the last value. */
export function queryParams(c: Context<AppEnv>): Record<string, string> {
  const params: Record<string, string> = {};
  const url = new URL(c.req.url);

  for (const [key, value] of url.searchParams.entries()) {
    params[key] = value;
  }

  return params;
}

/**
 * Reads a path parameter the route declares.
 *
 * @throws NotFoundError when the parameter is absent
 */
export function routeParam(c: Context<AppEnv>, name: string): string {
  const value = c.req.param(name);
  if (!value) {
    throw new NotFoundError('Not found');
  }
  return value;
}
