import {
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Readable } from 'node:stream';
import {
  AccessDeniedError,
  LogNotFoundError,
  TransientFetchError,
} from '../common/errors';
import { S3LogSource } from './s3.source';
import { collect } from '../../test/utils/test-helpers';

interface FakeObject {
  Key: string;
  Size: number;
}

/**
 * Two listing pages linked by a continuation token.
 */
const PAGES: Record<string, { objects: FakeObject[]; next?: string }> = {
  first: {
    objects: [
      { Key: 'logs/EL-040/', Size: 0 },
      { Key: 'logs/EL-040/flight-1.ulg', Size: 120 },
      { Key: 'logs/EL052/flight-2.ULG', Size: 80 },
    ],
    next: 'page-2',
  },
  'page-2': {
    objects: [
      { Key: 'logs/EL-041/flight-3.ulg', Size: 64 },
      { Key: 'logs/EL-041/readme.md', Size: 10 },
    ],
  },
};

describe('S3LogSource', () => {
  let client: S3Client;
  let listedTokens: Array<string | undefined>;

  beforeEach(() => {
    client = new S3Client({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
    listedTokens = [];

    jest.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      if (command instanceof ListObjectsV2Command) {
        const token = command.input.ContinuationToken;
        listedTokens.push(token);
        const page = PAGES[token ?? 'first'];
        return {
          $metadata: {},
          Contents: page.objects,
          NextContinuationToken: page.next,
          IsTruncated: page.next !== undefined,
        };
      }
      if (command instanceof GetObjectCommand) {
        const key = command.input.Key;
        if (key === 'logs/EL-040/flight-1.ulg') {
          return { $metadata: {}, Body: Readable.from([Buffer.from('ULog')]) };
        }
        if (key === 'logs/empty-body.ulg') {
          return { $metadata: {} };
        }
        if (key === 'logs/forbidden.ulg') {
          throw new S3ServiceException({
            name: 'AccessDenied',
            $fault: 'client',
            $metadata: { httpStatusCode: 403 },
            message: 'Access Denied',
          });
        }
        if (key === 'logs/slow.ulg') {
          throw Object.assign(new Error('socket hang up'), {
            code: 'ECONNRESET',
          });
        }
        throw new NoSuchKey({ $metadata: {}, message: 'The key does not exist' });
      }
      throw new Error('unexpected command');
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should follow continuation tokens across pages', async () => {
    const source = new S3LogSource(client, 'flight-logs', 'logs/');

    const refs = await collect(source.list());

    expect(listedTokens).toEqual([undefined, 'page-2']);
    expect(refs).toEqual([
      { identifier: 'logs/EL-040/flight-1.ulg', vehicleId: 'EL-040', sizeHint: 120 },
      { identifier: 'logs/EL052/flight-2.ULG', vehicleId: 'EL-052', sizeHint: 80 },
      { identifier: 'logs/EL-041/flight-3.ulg', vehicleId: 'EL-041', sizeHint: 64 },
      { identifier: 'logs/EL-041/readme.md', vehicleId: 'EL-041', sizeHint: 10 },
    ]);
  });

  it('should filter by extension case-insensitively and by vehicle', async () => {
    const source = new S3LogSource(client, 'flight-logs', 'logs/');

    const refs = await collect(
      source.list({
        extensions: ['.ulg'],
        vehicleFilter: new Set(['EL-052', 'EL-041']),
      }),
    );

    expect(refs.map((r) => r.identifier)).toEqual([
      'logs/EL052/flight-2.ULG',
      'logs/EL-041/flight-3.ulg',
    ]);
  });

  it('should describe its location as an s3 url', () => {
    expect(new S3LogSource(client, 'flight-logs', 'logs/').location).toBe(
      's3://flight-logs/logs/',
    );
  });

  it('should stream an object body', async () => {
    const source = new S3LogSource(client, 'flight-logs', 'logs/');

    const body = await source.open('logs/EL-040/flight-1.ulg');
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.from(chunk));
    }

    expect(Buffer.concat(chunks).toString('utf-8')).toBe('ULog');
  });

  it('should map NoSuchKey to LogNotFoundError', async () => {
    const source = new S3LogSource(client, 'flight-logs', 'logs/');

    await expect(source.open('logs/gone.ulg')).rejects.toBeInstanceOf(
      LogNotFoundError,
    );
  });

  it('should map a 403 to AccessDeniedError', async () => {
    const source = new S3LogSource(client, 'flight-logs', 'logs/');

    await expect(source.open('logs/forbidden.ulg')).rejects.toBeInstanceOf(
      AccessDeniedError,
    );
  });

  it.each(['logs/slow.ulg', 'logs/empty-body.ulg'])(
    'should treat %s as a transient failure',
    async (key) => {
      const source = new S3LogSource(client, 'flight-logs', 'logs/');

      await expect(source.open(key)).rejects.toBeInstanceOf(TransientFetchError);
    },
  );
});
