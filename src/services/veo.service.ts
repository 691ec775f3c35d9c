import { z } from 'zod';
import { BaseService } from './base.service';
import { GENERATION_CONFIG } from '@/config/generation.config';
import {
  SubmissionError,
  TransportError,
  UnsupportedEncodingError,
  getErrorMessage,
} from '@/lib/errors';
import type {
  AccessTokenProvider,
  IVideoGenerationClient,
  ObjectDownloader,
} from '@/interfaces/video-generation-client.interface';
import type {
  GenerationJob,
  PollResult,
  VideoDescriptor,
  VideoGenerationRequest,
} from '@/interfaces/generation.interface';

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<HttpResponse>;

export interface VeoServiceOptions {
  projectId: string;
  location: string;
  tokenProvider: AccessTokenProvider;
  downloader: ObjectDownloader;
  fetchFn?: HttpFetch;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const videoSchema = z
  .object({
    gcsUri: z.string().optional(),
    bytesBase64Encoded: z.string().optional(),
    mimeType: z.string().optional(),
  })
  .passthrough();

const submitResponseSchema = z.object({ name: z.string().optional() }).passthrough();

const operationSchema = z
  .object({
    done: z.boolean().optional(),
    error: z.unknown().optional(),
    response: z
      .object({
        videos: z.array(videoSchema).optional(),
        raiMediaFilteredCount: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Renders the error payload of a finished operation, e.g.
 * `{ code: 3, message: "Prompt was blocked" }` -> "Prompt was blocked (code 3)"
 */
export function describeRemoteError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return 'code' in error && error.code !== undefined
      ? `${error.message} (code ${String(error.code)})`
      : error.message;
  }
  return JSON.stringify(error);
}

/**
 * Client for Veo long running predictions on Vertex AI.
 *
 * Protocol: `:predictLongRunning` starts a job and returns its operation name,
 * `:fetchPredictOperation` reports its state, and each finished video is either
 * a Cloud Storage URI or inline base64 bytes.
 */
export class VeoService extends BaseService implements IVideoGenerationClient {
  private readonly baseUrl: string;
  private readonly projectId: string;
  private readonly location: string;
  private readonly tokenProvider: AccessTokenProvider;
  private readonly downloader: ObjectDownloader;
  private readonly fetchFn: HttpFetch;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: VeoServiceOptions) {
    super();
    this.validateRequired({ projectId: options.projectId, location: options.location }, [
      'projectId',
      'location',
    ]);

    this.projectId = options.projectId;
    this.location = options.location;
    this.baseUrl = `https://${options.location}-aiplatform.googleapis.com/v1`;
    this.tokenProvider = options.tokenProvider;
    this.downloader = options.downloader;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.pollIntervalMs = options.pollIntervalMs ?? GENERATION_CONFIG.pollIntervalMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  private modelEndpoint(model: string, method: 'predictLongRunning' | 'fetchPredictOperation') {
    return `projects/${this.projectId}/locations/${this.location}/publishers/google/models/${model}:${method}`;
  }

  /**
   * Authenticated POST. Any network, HTTP or decoding failure becomes a TransportError.
   */
  private async request(endpoint: string, body: Record<string, unknown>): Promise<unknown> {
    const token = await this.tokenProvider.getAccessToken();

    let response: HttpResponse;
    try {
      response = await this.fetchFn(`${this.baseUrl}/${endpoint}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TransportError(`Vertex AI request failed: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new TransportError(`Vertex AI API error: ${response.status} - ${text}`, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new TransportError(`Invalid JSON from Vertex AI: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Starts one generation job. Not retried.
   */
  async submit(request: VideoGenerationRequest): Promise<GenerationJob> {
    this.logOperation('Submitting Veo generation', {
      model: request.model,
      durationSeconds: request.durationSeconds,
      resolution: request.resolution,
    });

    const result = await this.request(this.modelEndpoint(request.model, 'predictLongRunning'), {
      instances: [{ prompt: request.prompt }],
      parameters: {
        durationSeconds: request.durationSeconds,
        resolution: request.resolution,
        generateAudio: request.generateAudio,
        sampleCount: request.sampleCount,
      },
    });

    const parsed = submitResponseSchema.safeParse(result);
    const operationName = parsed.success ? parsed.data.name : undefined;
    if (!operationName) {
      throw new SubmissionError(`Failed to get operation name: ${JSON.stringify(result)}`);
    }

    this.logOperation('Veo generation submitted', { operationName, model: request.model });
    return { operationName, model: request.model };
  }

  /**
   * Checks the operation every `pollIntervalMs` until it is done or
   * `maxWaitSeconds` have passed. A failed status call ends polling and is
   * returned as a finished result carrying the error.
   */
  async poll(
    operationName: string,
    model: string,
    maxWaitSeconds: number = GENERATION_CONFIG.maxWaitSeconds
  ): Promise<PollResult> {
    const endpoint = this.modelEndpoint(model, 'fetchPredictOperation');
    const startedAt = this.now();
    let attempts = 0;

    while (this.now() - startedAt < maxWaitSeconds * 1000) {
      attempts += 1;

      let operation: z.infer<typeof operationSchema>;
      try {
        operation = operationSchema.parse(await this.request(endpoint, { operationName }));
      } catch (error) {
        this.logger.warn('Veo status check failed', { operationName, attempts, error: getErrorMessage(error) });
        return {
          done: true,
          videos: [],
          raiMediaFilteredCount: 0,
          error: `API request failed: ${getErrorMessage(error)}`,
        };
      }

      if (operation.done) {
        if (operation.error !== undefined && operation.error !== null) {
          return {
            done: true,
            videos: [],
            raiMediaFilteredCount: 0,
            error: describeRemoteError(operation.error),
          };
        }

        const videos: VideoDescriptor[] = operation.response?.videos ?? [];
        this.logOperation('Veo operation finished', { operationName, attempts, videos: videos.length });
        return {
          done: true,
          videos,
          raiMediaFilteredCount: operation.response?.raiMediaFilteredCount ?? 0,
          error: null,
        };
      }

      this.logger.debug('Veo operation still running', { operationName, attempts });
      await this.sleep(this.pollIntervalMs);
    }

    this.logger.warn('Veo operation timed out', { operationName, attempts, maxWaitSeconds });
    return { done: false, videos: [], raiMediaFilteredCount: 0, error: 'Operation timed out' };
  }

  /**
   * Video bytes from a Cloud Storage reference or an inline base64 payload
   */
  async fetchVideo(video: VideoDescriptor): Promise<Buffer> {
    if (video.gcsUri !== undefined) {
      return this.downloader.download(video.gcsUri);
    }
    if (video.bytesBase64Encoded !== undefined) {
      return Buffer.from(video.bytesBase64Encoded, 'base64');
    }
    throw new UnsupportedEncodingError();
  }
}
