import * as fs from 'fs/promises';
import { z } from 'zod';
import type { UploadOutcome } from '../../types/commons';
import {
  AuthenticationError,
  CommonsExportError,
  TransportError,
  UploadConflictError,
  errorMessage,
} from '../errors';
import { DEFAULT_API_ENDPOINT, DEFAULT_USER_AGENT } from '../config/export-config';
import { SessionCookies } from './session-cookies';

const CHUNK_THRESHOLD_BYTES = 90 * 1024 * 1024; // 90 MiB - switch to chunked uploads above this
const CHUNK_SIZE_BYTES = 8 * 1024 * 1024; // 8 MiB chunks

// Upload warnings that mean "a file with this name is already there"
const EXISTS_WARNINGS = ['exists', 'exists-normalized', 'page-exists'];

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface UploadClient {
  login(username: string, password: string): Promise<boolean>;
  uploadFile(
    localFilePath: string,
    pageText: string,
    targetPageName: string,
    overwriteAllowed: boolean,
    editComment: string
  ): Promise<UploadOutcome>;
}

export interface CommonsServiceOptions {
  apiEndpoint?: string;
  userAgent?: string;
  fetch?: FetchLike;
  chunkThresholdBytes?: number;
  chunkSizeBytes?: number;
}

const apiErrorSchema = z.object({
  code: z.string(),
  info: z.string().optional(),
});

const errorResponseSchema = z.object({
  error: apiErrorSchema.optional(),
});

const tokensResponseSchema = z.object({
  query: z
    .object({
      tokens: z
        .object({
          logintoken: z.string().optional(),
          csrftoken: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  error: apiErrorSchema.optional(),
});

const loginResponseSchema = z.object({
  login: z
    .object({
      result: z.string(),
      reason: z.unknown().optional(),
      lgusername: z.string().optional(),
    })
    .optional(),
  error: apiErrorSchema.optional(),
});

const uploadResponseSchema = z.object({
  upload: z
    .object({
      result: z.string().optional(),
      filekey: z.string().optional(),
      warnings: z.record(z.unknown()).optional(),
      imageinfo: z.object({ descriptionurl: z.string().optional() }).optional(),
    })
    .optional(),
  error: apiErrorSchema.optional(),
});

const titleBlacklistResponseSchema = z.object({
  titleblacklist: z
    .object({
      result: z.string().optional(),
      reason: z.string().optional(),
      message: z.string().optional(),
      line: z.string().optional(),
    })
    .optional(),
});

type UploadResponse = z.infer<typeof uploadResponseSchema>;

type UploadRequest = {
  fileBuffer: Buffer;
  csrfToken: string;
  filename: string;
  text: string;
  comment: string;
  overwrite: boolean;
};

/**
 * Client for the MediaWiki action API of Wikimedia Commons.
 *
 * Holds one login session for the whole run: `login` is called once and
 * every upload reuses its cookies.
 */
export class CommonsService implements UploadClient {
  private apiEndpoint: string;
  private userAgent: string;
  private fetchImpl: FetchLike;
  private chunkThresholdBytes: number;
  private chunkSizeBytes: number;
  private cookies = new SessionCookies();
  private sessionUser: string | null = null;

  constructor(options: CommonsServiceOptions = {}) {
    this.apiEndpoint = options.apiEndpoint || DEFAULT_API_ENDPOINT;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetch || ((url, init) => fetch(url, init));
    this.chunkThresholdBytes = options.chunkThresholdBytes ?? CHUNK_THRESHOLD_BYTES;
    this.chunkSizeBytes = options.chunkSizeBytes ?? CHUNK_SIZE_BYTES;
  }

  get isAuthenticated(): boolean {
    return this.sessionUser !== null;
  }

  get username(): string | null {
    return this.sessionUser;
  }

  /**
   * Log in with a username and (bot) password. Returns false on any failure.
   */
  async login(username: string, password: string): Promise<boolean> {
    if (!username || !password) {
      console.error('[commons] ❌ Login failed: username and password are required');
      return false;
    }

    try {
      const tokenData = await this.get({ action: 'query', meta: 'tokens', type: 'login' }, tokensResponseSchema);
      const loginToken = tokenData.query?.tokens?.logintoken;
      if (!loginToken) {
        throw new AuthenticationError(tokenData.error?.info || 'Commons did not return a login token');
      }

      const body = new URLSearchParams({
        action: 'login',
        format: 'json',
        lgname: username,
        lgpassword: password,
        lgtoken: loginToken,
      });
      const data = await this.post(body, loginResponseSchema);

      const login = data.login;
      if (!login || login.result !== 'Success') {
        const reason = typeof login?.reason === 'string' ? login.reason : undefined;
        throw new AuthenticationError(
          reason || data.error?.info || `Login was not accepted (${login?.result ?? 'no result'})`
        );
      }

      this.sessionUser = login.lgusername || username;
      console.log(`[commons] ✓ Logged in as ${this.sessionUser}`);
      return true;
    } catch (error) {
      console.error('[commons] ❌ Login failed:', errorMessage(error, 'Unknown login error'));
      return false;
    }
  }

  /**
   * Upload a file together with its description page.
   * Automatically handles chunked uploads for files > 90 MiB
   */
  async uploadFile(
    localFilePath: string,
    pageText: string,
    targetPageName: string,
    overwriteAllowed: boolean,
    editComment: string
  ): Promise<UploadOutcome> {
    if (!this.isAuthenticated) {
      return this.failed(targetPageName, new AuthenticationError('Not logged in to Commons'));
    }

    try {
      // Pre-check title blacklist to provide early feedback
      const titleCheck = await this.checkTitleBlacklist(targetPageName);
      if (!titleCheck.ok) {
        return this.failed(
          targetPageName,
          new TransportError(
            titleCheck.message ||
              'Filename is blocked by Commons title blacklist. Please use a more descriptive filename.',
            { apiCode: 'titleblacklist' }
          )
        );
      }

      const csrfToken = await this.getCsrfToken();
      if (!csrfToken) {
        return this.failed(targetPageName, new TransportError('Failed to get CSRF token from Commons'));
      }

      const fileBuffer = await fs.readFile(localFilePath);
      const request: UploadRequest = {
        fileBuffer,
        csrfToken,
        filename: targetPageName,
        text: pageText,
        comment: editComment,
        overwrite: overwriteAllowed,
      };

      const useChunked = fileBuffer.length >= this.chunkThresholdBytes;
      const data = useChunked ? await this.uploadChunked(request) : await this.uploadDirect(request);

      return this.toOutcome(targetPageName, data);
    } catch (error) {
      const failure =
        error instanceof CommonsExportError
          ? error
          : new TransportError(errorMessage(error, 'Commons upload failed'), { cause: error });
      return this.failed(targetPageName, failure);
    }
  }

  /**
   * Direct upload for files < 90 MiB
   */
  private async uploadDirect({
    fileBuffer,
    csrfToken,
    filename,
    text,
    comment,
    overwrite,
  }: UploadRequest): Promise<UploadResponse> {
    const formData = new FormData();
    formData.set('action', 'upload');
    formData.set('format', 'json');
    formData.set('filename', filename);
    formData.set('token', csrfToken);
    formData.set('comment', comment);
    formData.set('text', text);
    if (overwrite) {
      formData.set('ignorewarnings', '1');
    }
    formData.set('file', new Blob([new Uint8Array(fileBuffer)]), filename);

    return this.post(formData, uploadResponseSchema);
  }

  /**
   * Chunked upload for files >= 90 MiB (up to 5 GiB on Commons)
   */
  private async uploadChunked({
    fileBuffer,
    csrfToken,
    filename,
    text,
    comment,
    overwrite,
  }: UploadRequest): Promise<UploadResponse> {
    let offset = 0;
    let fileKey: string | undefined;

    // Upload chunks to stash
    while (offset < fileBuffer.length) {
      const chunk = fileBuffer.subarray(offset, offset + this.chunkSizeBytes);
      const formData = new FormData();
      formData.set('action', 'upload');
      formData.set('format', 'json');
      formData.set('token', csrfToken);
      formData.set('filename', filename);
      formData.set('filesize', fileBuffer.length.toString());
      formData.set('offset', offset.toString());
      formData.set('stash', '1');
      formData.set('ignorewarnings', '1');
      if (fileKey) {
        formData.set('filekey', fileKey);
      }
      formData.set('chunk', new Blob([new Uint8Array(chunk)]), filename);

      const json = await this.post(formData, uploadResponseSchema);
      if (json.error) {
        return json;
      }

      fileKey = json.upload?.filekey || fileKey;
      offset += chunk.length;
    }

    if (!fileKey) {
      throw new TransportError('Commons chunk upload did not return filekey');
    }

    // Finalize upload from stash
    const finalForm = new FormData();
    finalForm.set('action', 'upload');
    finalForm.set('format', 'json');
    finalForm.set('token', csrfToken);
    finalForm.set('filekey', fileKey);
    finalForm.set('filename', filename);
    finalForm.set('comment', comment);
    finalForm.set('text', text);
    if (overwrite) {
      finalForm.set('ignorewarnings', '1');
    }

    return this.post(finalForm, uploadResponseSchema);
  }

  /**
   * Map an upload response to the per-image outcome.
   */
  private toOutcome(pageName: string, data: UploadResponse): UploadOutcome {
    if (data.error) {
      const { code, info } = data.error;
      if (code.startsWith('fileexists')) {
        return this.failed(pageName, new UploadConflictError(pageName, info));
      }
      return this.failed(pageName, new TransportError(info || code, { apiCode: code }));
    }

    const upload = data.upload;
    if (upload?.result === 'Success') {
      return {
        status: 'succeeded',
        pageName,
        descriptionUrl: upload.imageinfo?.descriptionurl,
        warnings: upload.warnings,
      };
    }

    if (upload?.result === 'Warning') {
      const warnings = upload.warnings || {};
      if (EXISTS_WARNINGS.some((key) => key in warnings)) {
        return this.failed(pageName, new UploadConflictError(pageName), warnings);
      }
      return this.failed(
        pageName,
        new TransportError(`Commons returned warnings: ${Object.keys(warnings).join(', ') || 'unknown'}`, {
          apiCode: 'warnings',
        }),
        warnings
      );
    }

    return this.failed(
      pageName,
      new TransportError(`Unexpected upload result from Commons: ${upload?.result ?? 'none'}`)
    );
  }

  private failed(pageName: string, error: CommonsExportError, warnings?: unknown): UploadOutcome {
    return { status: 'failed', pageName, reason: error.message, error, warnings };
  }

  /**
   * Get CSRF token required for upload
   */
  private async getCsrfToken(): Promise<string | null> {
    const data = await this.get({ action: 'query', meta: 'tokens', type: 'csrf' }, tokensResponseSchema);
    const token = data.query?.tokens?.csrftoken;
    // '+\' is the token of an anonymous session
    return token && token !== '+\\' ? token : null;
  }

  /**
   * Pre-check if filename will be blocked by Commons title blacklist
   * This provides early feedback before attempting upload
   */
  async checkTitleBlacklist(filename: string): Promise<{ ok: boolean; message?: string }> {
    const title = filename.startsWith('File:') ? filename : `File:${filename}`;

    try {
      const data = await this.get(
        { action: 'titleblacklist', tbtitle: title, tbaction: 'upload', tbnooverride: '1' },
        titleBlacklistResponseSchema
      );
      const result = data.titleblacklist;

      if (result?.result === 'blacklisted') {
        const msg = result.message || result.reason || result.line;
        return {
          ok: false,
          message:
            msg ||
            'Filename rejected by Commons title blacklist. Please use a more descriptive filename (avoid patterns like IMG_1234.JPG).',
        };
      }

      return { ok: true };
    } catch (err) {
      // On network/API failure, don't block upload; let Commons respond during upload
      console.error('[commons] Title blacklist check error:', errorMessage(err, 'unknown error'));
      return { ok: true };
    }
  }

  /**
   * Build request headers with session cookies and user-agent
   */
  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    const cookie = this.cookies.header();
    if (cookie) {
      headers.Cookie = cookie;
    }
    return headers;
  }

  private async get<S extends z.ZodTypeAny>(params: Record<string, string>, schema: S): Promise<z.infer<S>> {
    const query = new URLSearchParams({ ...params, format: 'json' });
    return this.request(`${this.apiEndpoint}?${query.toString()}`, { method: 'GET' }, schema);
  }

  private async post<S extends z.ZodTypeAny>(body: FormData | URLSearchParams, schema: S): Promise<z.infer<S>> {
    return this.request(this.apiEndpoint, { method: 'POST', body }, schema);
  }

  private async request<S extends z.ZodTypeAny>(url: string, init: RequestInit, schema: S): Promise<z.infer<S>> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, headers: this.buildHeaders() });
    } catch (error) {
      throw new TransportError(`Request to Commons failed: ${errorMessage(error, 'network error')}`, {
        cause: error,
      });
    }

    this.cookies.store(response.headers.getSetCookie());

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new TransportError(`Commons returned an unreadable response (HTTP ${response.status})`, {
        status: response.status,
        cause: error,
      });
    }

    if (!response.ok) {
      const failure = errorResponseSchema.safeParse(json);
      const apiError = failure.success ? failure.data.error : undefined;
      throw new TransportError(apiError?.info || `Commons request failed with HTTP ${response.status}`, {
        status: response.status,
        apiCode: apiError?.code,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError('Commons returned an unexpected response', { status: response.status });
    }

    return parsed.data;
  }
}
