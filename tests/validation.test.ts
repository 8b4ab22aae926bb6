import { describe, it, expect } from 'vitest';
import {
  AskRequestSchema,
  SearchRequestSchema,
  UploadUrlRequestSchema,
  VideoListQuerySchema,
  parseRequest,
} from '../src/utils/validation.ts';
import { ValidationError } from '../src/utils/errors.ts';

describe('parseRequest', () => {
  it('applies defaults', () => {
    expect(parseRequest(UploadUrlRequestSchema, { fileName: ' clip.mp4 ' }, 'Invalid request body'))
      .toEqual({ fileName: 'clip.mp4', contentType: 'video/mp4' });
    expect(parseRequest(AskRequestSchema, { videoId: 'vid-1', question: 'Who?' }, 'Invalid request body'))
      .toEqual({ videoId: 'vid-1', question: 'Who?', responseFormat: 'detailed' });
    expect(parseRequest(SearchRequestSchema, { videoId: 'vid-1', searchQuery: 'goal' }, 'Invalid request body'))
      .toEqual({ videoId: 'vid-1', searchQuery: 'goal', searchType: 'all' });
  });

  it('coerces list query strings', () => {
    expect(parseRequest(VideoListQuerySchema, { limit: '10', offset: '20' }, 'Invalid query parameters'))
      .toEqual({ limit: 10, offset: 20 });
  });

  it('lists every issue in the details', () => {
    let caught: unknown;
    try {
      parseRequest(AskRequestSchema, { videoId: 7, question: '   ' }, 'Invalid request body');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid request body',
      details: 'videoId: videoId must be a string; question: question is required',
    });
  });
});
