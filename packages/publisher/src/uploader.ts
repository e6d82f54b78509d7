import type { Auth } from 'googleapis';
import * as fs from 'fs';
import { z } from 'zod';
import {
  errorMessage,
  type Logger,
  type UploadRequest,
  type UploadResult,
  type VideoPublisher,
} from '@horror-shorts/shared';

/** YouTube video category 17 (Sports). */
export const YOUTUBE_CATEGORY_ID = '17';

export const RESUMABLE_UPLOAD_URL = 'https://www.googleapis.com/upload/youtube/v3/videos';

export const DEFAULT_UPLOAD_METADATA: Readonly<Omit<UploadRequest, 'videoPath'>> = {
  title: 'Haunting Horror Movie Quotes',
  description: 'A collection of the most spine-chilling quotes from classic horror films',
  tags: ['horror', 'movie quotes', 'scary', 'horror films', 'shorts'],
};

export class UploadError extends Error {
  constructor(
    message: string,
    public videoPath: string,
  ) {
    super(message);
    this.name = 'UploadError';
  }
}

export interface YouTubeAuthorizer {
  authorize(): Promise<Auth.OAuth2Client>;
}

export interface UploaderOptions {
  auth: YouTubeAuthorizer;
  dryRun?: boolean;
  /** Transfer attempts per session, counting the first. */
  maxAttempts?: number;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

const uploadedVideoSchema = z.object({ id: z.string().min(1) });
const failedResponseSchema = z.object({ response: z.object({ status: z.number() }) });

/** Where a session stands after a status query. */
type SessionState = { kind: 'complete'; videoId: string } | { kind: 'partial'; offset: number };

/** Uploads finished videos as private Shorts through the YouTube Data API v3.
 * Defaults to dry-run mode: set dryRun=false for actual uploads.
 *
 * Uses the resumable upload protocol: a session is opened with the video
 * metadata, the file is PUT to the session URL, and an interrupted transfer
 * resumes from the byte offset the server acknowledges. */
export class YouTubeUploader implements VideoPublisher {
  private dryRun: boolean;
  private maxAttempts: number;

  constructor(
    private options: UploaderOptions,
    private logger: Logger,
  ) {
    this.dryRun = options.dryRun ?? true;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  }

  async upload(request: UploadRequest): Promise<UploadResult> {
    if (!fs.existsSync(request.videoPath)) {
      throw new UploadError(`Video file not found: ${request.videoPath}`, request.videoPath);
    }

    if (this.dryRun) {
      const dryId = `dry-run-${Date.now()}`;
      this.logger.info({ title: request.title, videoPath: request.videoPath }, 'DRY RUN: Would upload video');
      return { videoId: dryId, url: watchUrl(dryId), dryRun: true };
    }

    try {
      const auth = await this.options.auth.authorize();
      const size = fs.statSync(request.videoPath).size;

      this.logger.info({ title: request.title, sizeBytes: size }, 'Uploading video to YouTube');

      const sessionUrl = await this.openSession(auth, request, size);
      const videoId = await this.transfer(auth, sessionUrl, request.videoPath, size);

      this.logger.info({ videoId }, 'Video uploaded successfully');
      return { videoId, url: watchUrl(videoId), dryRun: false };
    } catch (err) {
      if (err instanceof UploadError) throw err;
      throw new UploadError(`Upload failed: ${errorMessage(err)}`, request.videoPath);
    }
  }

  private async openSession(auth: Auth.OAuth2Client, request: UploadRequest, size: number): Promise<string> {
    const res = await auth.request<unknown>({
      method: 'POST',
      url: RESUMABLE_UPLOAD_URL,
      params: { uploadType: 'resumable', part: 'snippet,status' },
      headers: {
        'Content-Type': 'application/json; charset=UTF-8',
        'X-Upload-Content-Type': 'video/mp4',
        'X-Upload-Content-Length': String(size),
      },
      data: {
        snippet: {
          title: request.title,
          description: request.description,
          tags: request.tags,
          categoryId: YOUTUBE_CATEGORY_ID,
        },
        status: {
          privacyStatus: 'private',
          selfDeclaredMadeForKids: false,
        },
      },
    });

    const location: unknown = res.headers.location;
    if (typeof location !== 'string' || location === '') {
      throw new Error('YouTube did not return an upload session URL');
    }
    return location;
  }

  private async transfer(auth: Auth.OAuth2Client, sessionUrl: string, videoPath: string, size: number): Promise<string> {
    let offset = 0;

    for (let attempt = 1; ; attempt++) {
      const headers: Record<string, string> = {
        'Content-Type': 'video/mp4',
        'Content-Length': String(size - offset),
      };
      if (offset > 0) headers['Content-Range'] = `bytes ${offset}-${size - 1}/${size}`;

      try {
        const res = await auth.request<unknown>({
          method: 'PUT',
          url: sessionUrl,
          headers,
          data: fs.createReadStream(videoPath, { start: offset }),
        });
        return videoIdFrom(res.data);
      } catch (err) {
        if (attempt >= this.maxAttempts || !isResumable(err)) throw err;
        this.logger.warn({ attempt, error: errorMessage(err) }, 'Upload interrupted, checking session status');
      }

      const state = await this.querySession(auth, sessionUrl, size);
      if (state.kind === 'complete') return state.videoId;
      offset = state.offset;
      this.logger.info({ offset, sizeBytes: size }, 'Resuming upload');
    }
  }

  private async querySession(auth: Auth.OAuth2Client, sessionUrl: string, size: number): Promise<SessionState> {
    const res = await auth.request<unknown>({
      method: 'PUT',
      url: sessionUrl,
      headers: { 'Content-Range': `bytes */${size}`, 'Content-Length': '0' },
      validateStatus: (status) => status === 308 || (status >= 200 && status < 300),
    });

    if (res.status !== 308) return { kind: 'complete', videoId: videoIdFrom(res.data) };
    const range: unknown = res.headers.range;
    return { kind: 'partial', offset: typeof range === 'string' ? acknowledgedOffset(range) : 0 };
  }
}

/** Next byte to send, given a `Range: bytes=0-N` header from a status query. */
export function acknowledgedOffset(range: string): number {
  const match = /^bytes=0-(\d+)$/.exec(range.trim());
  return match ? Number(match[1]) + 1 : 0;
}

function videoIdFrom(data: unknown): string {
  const parsed = uploadedVideoSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error('YouTube upload succeeded but returned no video ID');
  }
  return parsed.data.id;
}

/** Network failures and 5xx responses can be resumed; other client errors cannot. */
function isResumable(err: unknown): boolean {
  const failed = failedResponseSchema.safeParse(err);
  return !failed.success || failed.data.response.status >= 500;
}
