/**
 * In-process fakes of the stage capability ports.
 */

import { StageContext } from '../../src/domain/pipeline';
import { createLogger } from '../../src/logger';
import {
  CdnClient,
  EdgeResponse,
  ImageOptimizer,
  ObjectHead,
  ObjectStore,
  OptimizeOptions,
  OptimizedImage,
  PurgeRequest,
  PurgeState,
  PutObjectInput,
  PutObjectOutput,
  ResizeOptions,
} from '../../src/stages/ports';

export function stageContext(stage: string, overrides: Partial<StageContext> = {}): StageContext {
  return {
    runId: 'run_test',
    stage,
    attempt: 1,
    signal: new AbortController().signal,
    logger: createLogger({ test: true }),
    ...overrides,
  };
}

interface StoredObject {
  body: Buffer;
  contentType: string;
  metadata: Record<string, string>;
}

/** Object store keeping objects in a map; failNext() queues errors for upcoming calls. */
export class FakeObjectStore implements ObjectStore {
  objects = new Map<string, StoredObject>();
  calls: string[] = [];
  private failures: Error[] = [];
  private putFailures = new Map<string, Error>();

  failNext(error: Error): void {
    this.failures.push(error);
  }

  /** The next put of `key` throws `error`. */
  failPut(key: string, error: Error): void {
    this.putFailures.set(key, error);
  }

  async putObject(input: PutObjectInput): Promise<PutObjectOutput> {
    this.calls.push(`put ${input.bucket}/${input.key}`);
    this.throwQueued();
    const keyFailure = this.putFailures.get(input.key);
    if (keyFailure) {
      this.putFailures.delete(input.key);
      throw keyFailure;
    }
    this.objects.set(`${input.bucket}/${input.key}`, {
      body: input.body,
      contentType: input.contentType,
      metadata: { ...input.metadata },
    });
    return { etag: `"etag-${input.key}"`, multipart: false };
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    this.calls.push(`delete ${bucket}/${key}`);
    this.throwQueued();
    this.objects.delete(`${bucket}/${key}`);
  }

  async headObject(bucket: string, key: string): Promise<ObjectHead | null> {
    this.calls.push(`head ${bucket}/${key}`);
    this.throwQueued();
    const object = this.objects.get(`${bucket}/${key}`);
    if (!object) return null;
    return { sizeBytes: object.body.length, contentType: object.contentType, metadata: object.metadata };
  }

  private throwQueued(): void {
    const failure = this.failures.shift();
    if (failure) throw failure;
  }
}

/**
 * CDN fake. Each purge or status poll takes the next entry of `purgeStates`;
 * the last entry repeats.
 */
export class FakeCdnClient implements CdnClient {
  purges: string[][] = [];
  statusPolls = 0;
  purgeStates: PurgeState[] = ['completed'];
  edge: EdgeResponse = { statusCode: 200, cacheStatus: 'MISS', ageSeconds: 0 };
  edgeRequests: string[] = [];

  async purge(paths: string[]): Promise<PurgeRequest> {
    this.purges.push(paths);
    return { purgeId: `purge_${this.purges.length}`, state: this.nextState() };
  }

  async purgeStatus(purgeId: string): Promise<PurgeRequest> {
    this.statusPolls++;
    return { purgeId, state: this.nextState() };
  }

  async fetchEdge(url: string): Promise<EdgeResponse> {
    this.edgeRequests.push(url);
    return this.edge;
  }

  private nextState(): PurgeState {
    const [next, ...rest] = this.purgeStates;
    if (rest.length > 0) this.purgeStates = rest;
    return next ?? 'completed';
  }
}

/**
 * Optimizer returning the first half of the input with fixed dimensions.
 * resize() returns "<width>x<height>" as the image bytes.
 */
export class FakeOptimizer implements ImageOptimizer {
  calls: OptimizeOptions[] = [];
  resizeCalls: ResizeOptions[] = [];
  error?: Error;

  async optimize(input: Buffer, options: OptimizeOptions): Promise<OptimizedImage> {
    this.calls.push(options);
    if (this.error) throw this.error;
    return {
      data: input.subarray(0, Math.floor(input.length / 2)),
      format: options.format,
      width: 640,
      height: 480,
    };
  }

  async resize(_input: Buffer, options: ResizeOptions): Promise<OptimizedImage> {
    this.resizeCalls.push(options);
    if (this.error) throw this.error;
    return {
      data: Buffer.from(`${options.width}x${options.height}`),
      format: options.format,
      width: options.width,
      height: options.height,
    };
  }
}
