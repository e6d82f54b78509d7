import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import { join } from 'path';
import type { Auth } from 'googleapis';
import type { Logger, UploadRequest } from '@horror-shorts/shared';
import {
  DEFAULT_UPLOAD_METADATA,
  RESUMABLE_UPLOAD_URL,
  UploadError,
  YouTubeUploader,
  acknowledgedOffset,
  type YouTubeAuthorizer,
} from './uploader.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

const SESSION_URL = 'https://upload.example.test/session-1';

const mockRequest = vi.fn();
const fakeClient = { credentials: {}, request: mockRequest } as unknown as Auth.OAuth2Client;

const sessionOpened = { status: 200, headers: { location: SESSION_URL }, data: '' };
const uploaded = (id: string) => ({ status: 200, headers: {}, data: { id } });
const httpError = (status: number) =>
  Object.assign(new Error(`Request failed with status code ${status}`), { response: { status } });

describe('YouTubeUploader', () => {
  let dir: string;
  let request: UploadRequest;
  let auth: YouTubeAuthorizer;

  beforeEach(() => {
    vi.clearAllMocks();
    mockRequest.mockReset();
    dir = fs.mkdtempSync(join(os.tmpdir(), 'uploader-test-'));
    const videoPath = join(dir, 'horror_quotes_20240101_120000.mp4');
    fs.writeFileSync(videoPath, 'mp4');
    request = { videoPath, ...DEFAULT_UPLOAD_METADATA };
    auth = { authorize: vi.fn().mockResolvedValue(fakeClient) };
  });

  afterEach(() => {
    for (const [options] of mockRequest.mock.calls) {
      if (options.data instanceof fs.ReadStream) options.data.destroy();
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('defaults to dry-run and never authorizes', async () => {
    const uploader = new YouTubeUploader({ auth }, mockLogger);
    const result = await uploader.upload(request);

    expect(result.dryRun).toBe(true);
    expect(result.videoId).toMatch(/^dry-run-\d+$/);
    expect(result.url).toBe(`https://www.youtube.com/watch?v=${result.videoId}`);
    expect(auth.authorize).not.toHaveBeenCalled();
    expect(mockRequest).not.toHaveBeenCalled();
    expect(mockLogger.info).toHaveBeenCalledWith(
      { title: 'Haunting Horror Movie Quotes', videoPath: request.videoPath },
      'DRY RUN: Would upload video',
    );
  });

  it('opens a resumable session and sends the file to it', async () => {
    mockRequest.mockResolvedValueOnce(sessionOpened).mockResolvedValueOnce(uploaded('yt-video-123'));
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);
    const result = await uploader.upload(request);

    expect(result).toEqual({
      videoId: 'yt-video-123',
      url: 'https://www.youtube.com/watch?v=yt-video-123',
      dryRun: false,
    });
    expect(mockRequest).toHaveBeenCalledTimes(2);

    const session = mockRequest.mock.calls[0][0];
    expect(session.method).toBe('POST');
    expect(session.url).toBe(RESUMABLE_UPLOAD_URL);
    expect(session.params).toEqual({ uploadType: 'resumable', part: 'snippet,status' });
    expect(session.headers).toEqual({
      'Content-Type': 'application/json; charset=UTF-8',
      'X-Upload-Content-Type': 'video/mp4',
      'X-Upload-Content-Length': '3',
    });
    expect(session.data).toEqual({
      snippet: {
        title: 'Haunting Horror Movie Quotes',
        description: 'A collection of the most spine-chilling quotes from classic horror films',
        tags: ['horror', 'movie quotes', 'scary', 'horror films', 'shorts'],
        categoryId: '17',
      },
      status: { privacyStatus: 'private', selfDeclaredMadeForKids: false },
    });

    const put = mockRequest.mock.calls[1][0];
    expect(put.method).toBe('PUT');
    expect(put.url).toBe(SESSION_URL);
    expect(put.headers).toEqual({ 'Content-Type': 'video/mp4', 'Content-Length': '3' });
    expect(put.data).toBeInstanceOf(fs.ReadStream);
    expect(put.data.start).toBe(0);
  });

  it('queries the session after an interruption and resumes from the acknowledged offset', async () => {
    mockRequest
      .mockResolvedValueOnce(sessionOpened)
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ status: 308, headers: { range: 'bytes=0-1' }, data: '' })
      .mockResolvedValueOnce(uploaded('yt-resumed'));
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);
    const result = await uploader.upload(request);

    expect(result.videoId).toBe('yt-resumed');
    expect(mockRequest).toHaveBeenCalledTimes(4);

    const query = mockRequest.mock.calls[2][0];
    expect(query.method).toBe('PUT');
    expect(query.url).toBe(SESSION_URL);
    expect(query.headers).toEqual({ 'Content-Range': 'bytes */3', 'Content-Length': '0' });
    expect(query.data).toBeUndefined();
    expect(query.validateStatus(308)).toBe(true);
    expect(query.validateStatus(500)).toBe(false);

    const resumed = mockRequest.mock.calls[3][0];
    expect(resumed.headers).toEqual({
      'Content-Type': 'video/mp4',
      'Content-Length': '1',
      'Content-Range': 'bytes 2-2/3',
    });
    expect(resumed.data.start).toBe(2);
    expect(mockLogger.info).toHaveBeenCalledWith({ offset: 2, sizeBytes: 3 }, 'Resuming upload');
  });

  it('restarts from the first byte when the server has acknowledged nothing', async () => {
    mockRequest
      .mockResolvedValueOnce(sessionOpened)
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce({ status: 308, headers: {}, data: '' })
      .mockResolvedValueOnce(uploaded('yt-restarted'));
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    expect((await uploader.upload(request)).videoId).toBe('yt-restarted');
    const resumed = mockRequest.mock.calls[3][0];
    expect(resumed.headers).toEqual({ 'Content-Type': 'video/mp4', 'Content-Length': '3' });
    expect(resumed.data.start).toBe(0);
  });

  it('finishes when the status query shows the upload already completed', async () => {
    mockRequest
      .mockResolvedValueOnce(sessionOpened)
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(uploaded('yt-already-done'));
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    expect((await uploader.upload(request)).videoId).toBe('yt-already-done');
    expect(mockRequest).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured number of attempts', async () => {
    mockRequest
      .mockResolvedValueOnce(sessionOpened)
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ status: 308, headers: { range: 'bytes=0-0' }, data: '' })
      .mockRejectedValueOnce(new Error('socket hang up again'));
    const uploader = new YouTubeUploader({ auth, dryRun: false, maxAttempts: 2 }, mockLogger);

    await expect(uploader.upload(request)).rejects.toThrow('Upload failed: socket hang up again');
    expect(mockRequest).toHaveBeenCalledTimes(4);
  });

  it('does not resume after a client error', async () => {
    mockRequest.mockResolvedValueOnce(sessionOpened).mockRejectedValueOnce(httpError(400));
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    await expect(uploader.upload(request)).rejects.toThrow('Upload failed: Request failed with status code 400');
    expect(mockRequest).toHaveBeenCalledTimes(2);
  });

  it('fails when no session URL comes back', async () => {
    mockRequest.mockResolvedValueOnce({ status: 200, headers: {}, data: '' });
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    await expect(uploader.upload(request)).rejects.toThrow(
      'Upload failed: YouTube did not return an upload session URL',
    );
    expect(mockRequest).toHaveBeenCalledTimes(1);
  });

  it('rejects a missing video before authorizing', async () => {
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);
    const missing = join(dir, 'missing.mp4');

    await expect(uploader.upload({ ...request, videoPath: missing })).rejects.toThrow(
      `Video file not found: ${missing}`,
    );
    expect(auth.authorize).not.toHaveBeenCalled();
  });

  it('wraps API failures in UploadError', async () => {
    mockRequest.mockRejectedValueOnce(new Error('quotaExceeded'));
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    const err = await uploader.upload(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UploadError);
    if (err instanceof UploadError) {
      expect(err.message).toBe('Upload failed: quotaExceeded');
      expect(err.videoPath).toBe(request.videoPath);
    }
  });

  it('wraps authorization failures in UploadError', async () => {
    auth = { authorize: vi.fn().mockRejectedValue(new Error('Client secret file not found: x')) };
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    await expect(uploader.upload(request)).rejects.toThrow('Upload failed: Client secret file not found: x');
  });

  it('fails when the API returns no id', async () => {
    mockRequest.mockResolvedValueOnce(sessionOpened).mockResolvedValueOnce({ status: 200, headers: {}, data: {} });
    const uploader = new YouTubeUploader({ auth, dryRun: false }, mockLogger);

    await expect(uploader.upload(request)).rejects.toThrow(
      'Upload failed: YouTube upload succeeded but returned no video ID',
    );
  });
});

describe('acknowledgedOffset', () => {
  it('returns the byte after the acknowledged range', () => {
    expect(acknowledgedOffset('bytes=0-1048575')).toBe(1048576);
  });

  it('starts over on an unrecognised range', () => {
    expect(acknowledgedOffset('bytes=5-9')).toBe(0);
  });
});
