import { describe, it, expect, vi } from 'vitest';
import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { S3ObjectStore } from '../src/storage/s3.ts';
import { StorageError } from '../src/utils/errors.ts';

function realClient(): S3Client {
  return new S3Client({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
  });
}

/** S3 client whose send is replaced by `send`. */
function stubClient(send: (command: unknown) => Promise<unknown>) {
  const mock = vi.fn(send);
  return { client: Object.assign(realClient(), { send: mock }), send: mock };
}

const LOCATION = { bucket: 'test-bucket', key: 'analysis/vid-1/results.json' };

describe('S3ObjectStore.createUploadUrl', () => {
  it('signs a PUT URL for the key with the requested lifetime', async () => {
    const store = new S3ObjectStore(realClient(), 'test-bucket');

    const url = new URL(await store.createUploadUrl('videos/ns-1/clip.mp4', 'video/mp4', 3600));

    expect(url.hostname).toBe('test-bucket.s3.us-east-1.amazonaws.com');
    expect(url.pathname).toBe('/videos/ns-1/clip.mp4');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('3600');
    expect(url.searchParams.get('X-Amz-Signature')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('S3ObjectStore.readJson', () => {
  it('parses the object body', async () => {
    const { client, send } = stubClient(async () => ({
      Body: { transformToString: async () => '{"highlights":[]}' },
    }));

    const document = await new S3ObjectStore(client, 'test-bucket').readJson(LOCATION);

    expect(document).toEqual({ highlights: [] });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetObjectCommand);
    if (command instanceof GetObjectCommand) {
      expect(command.input).toEqual({ Bucket: 'test-bucket', Key: 'analysis/vid-1/results.json' });
    }
  });

  it('returns null for a missing key', async () => {
    const { client } = stubClient(async () => {
      throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: {} });
    });

    await expect(new S3ObjectStore(client, 'test-bucket').readJson(LOCATION)).resolves.toBeNull();
  });

  it('returns null when only the error name says the key is missing', async () => {
    const missing = new Error('gone');
    missing.name = 'NoSuchKey';
    const { client } = stubClient(async () => {
      throw missing;
    });

    await expect(new S3ObjectStore(client, 'test-bucket').readJson(LOCATION)).resolves.toBeNull();
  });

  it('wraps other read failures', async () => {
    const { client } = stubClient(async () => {
      throw new Error('Access Denied');
    });

    const error = await new S3ObjectStore(client, 'test-bucket').readJson(LOCATION).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      message: 'Error downloading s3://test-bucket/analysis/vid-1/results.json: Access Denied',
    });
  });

  it('rejects an empty body', async () => {
    const { client } = stubClient(async () => ({}));

    await expect(new S3ObjectStore(client, 'test-bucket').readJson(LOCATION))
      .rejects.toThrow('Empty object body at s3://test-bucket/analysis/vid-1/results.json');
  });

  it('rejects a body that is not JSON', async () => {
    const { client } = stubClient(async () => ({
      Body: { transformToString: async () => '<html>' },
    }));

    await expect(new S3ObjectStore(client, 'test-bucket').readJson(LOCATION))
      .rejects.toThrow('Object at s3://test-bucket/analysis/vid-1/results.json is not valid JSON');
  });
});

describe('S3ObjectStore.writeJson', () => {
  it('puts pretty-printed JSON to the configured bucket', async () => {
    const { client, send } = stubClient(async () => ({}));

    await new S3ObjectStore(client, 'test-bucket').writeJson('analysis/vid-1/results.json', { ok: true });

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    if (command instanceof PutObjectCommand) {
      expect(command.input).toEqual({
        Bucket: 'test-bucket',
        Key: 'analysis/vid-1/results.json',
        Body: '{\n  "ok": true\n}',
        ContentType: 'application/json',
      });
    }
  });

  it('wraps write failures', async () => {
    const { client } = stubClient(async () => {
      throw new Error('SlowDown');
    });

    await expect(new S3ObjectStore(client, 'test-bucket').writeJson('k.json', {}))
      .rejects.toThrow('Failed to write s3://test-bucket/k.json: SlowDown');
  });
});
