import type {
  GenerationJob,
  PollResult,
  VideoDescriptor,
  VideoGenerationRequest,
} from './generation.interface';

/**
 * Remote video generation service as seen by the pipeline
 */
export interface IVideoGenerationClient {
  /**
   * Starts a long running generation job
   */
  submit(request: VideoGenerationRequest): Promise<GenerationJob>;

  /**
   * Waits for the job to finish, checking its state at a fixed interval
   */
  poll(operationName: string, model: string, maxWaitSeconds?: number): Promise<PollResult>;

  /**
   * Resolves a video result to its bytes
   */
  fetchVideo(video: VideoDescriptor): Promise<Buffer>;
}

/** Supplies a fresh bearer token for each call */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/** Downloads objects addressed by gs:// URIs */
export interface ObjectDownloader {
  download(uri: string): Promise<Buffer>;
}
