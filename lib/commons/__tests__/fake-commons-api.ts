import type { FetchLike } from '../commons.service';

export const LOGIN_TOKEN = 'login-token+\\';
export const CSRF_TOKEN = 'csrf-token+\\';
export const SESSION_COOKIE = 'commonswikiSession=test-session';

export type RecordedCall = {
  method: string;
  params: Record<string, string>;
  fileBytes: Record<string, number>;
  cookie: string | null;
};

export type StoredUpload = {
  filename: string;
  text: string;
  comment: string;
  size: number;
};

/**
 * In-process stand-in for the MediaWiki action API, enough for login,
 * tokens, title blacklist and (chunked) uploads.
 */
export class FakeCommonsApi {
  calls: RecordedCall[] = [];
  uploads: StoredUpload[] = [];
  existing = new Set<string>();
  blacklisted = new Set<string>();
  username = 'Example';
  password = 'test-secret';
  existsAsError = false;
  uploadFailure: 'network' | number | null = null;
  blacklistFailure: 'network' | number | null = null;
  anonymousCsrf = false;
  uploadWarnings: Record<string, unknown> | null = null;
  failChunk: number | null = null;

  private loggedIn = false;
  private stash = new Map<string, number>();
  private stashCounter = 0;
  private chunkCount = 0;

  fetch: FetchLike = async (url, init) => this.handle(url, init);

  private async handle(url: string, init: RequestInit): Promise<Response> {
    const method = init.method || 'GET';
    const params: Record<string, string> = {};
    const fileBytes: Record<string, number> = {};

    if (method === 'GET') {
      new URL(url).searchParams.forEach((value, key) => {
        params[key] = value;
      });
    } else if (init.body instanceof URLSearchParams) {
      init.body.forEach((value, key) => {
        params[key] = value;
      });
    } else if (init.body instanceof FormData) {
      for (const [key, value] of init.body.entries()) {
        if (typeof value === 'string') {
          params[key] = value;
        } else {
          fileBytes[key] = value.size;
        }
      }
    }

    const cookie = new Headers(init.headers).get('cookie');
    this.calls.push({ method, params, fileBytes, cookie });

    if (params.action === 'upload' && this.uploadFailure !== null) {
      if (this.uploadFailure === 'network') {
        throw new TypeError('fetch failed');
      }
      return this.json({ error: { code: 'internal_api_error', info: 'Server exploded' } }, this.uploadFailure);
    }

    if (params.action === 'titleblacklist' && this.blacklistFailure !== null) {
      if (this.blacklistFailure === 'network') {
        throw new TypeError('fetch failed');
      }
      return this.json({ error: { code: 'internal_api_error', info: 'Blacklist unavailable' } }, this.blacklistFailure);
    }

    switch (params.action) {
      case 'query':
        return this.tokens(params.type);
      case 'login':
        return this.login(params);
      case 'titleblacklist':
        return this.json({
          titleblacklist: this.blacklisted.has(params.tbtitle)
            ? { result: 'blacklisted', reason: 'Title matches a blocked pattern' }
            : { result: 'ok' },
        });
      case 'upload':
        return this.upload(params, fileBytes);
      default:
        return this.json({ error: { code: 'badvalue', info: `Unrecognized action ${params.action}` } });
    }
  }

  private tokens(type: string): Response {
    if (type === 'login') {
      return this.json({ query: { tokens: { logintoken: LOGIN_TOKEN } } }, 200, [`${SESSION_COOKIE}; path=/; HttpOnly`]);
    }
    return this.json({ query: { tokens: { csrftoken: this.loggedIn && !this.anonymousCsrf ? CSRF_TOKEN : '+\\' } } });
  }

  private login(params: Record<string, string>): Response {
    if (params.lgtoken !== LOGIN_TOKEN) {
      return this.json({ login: { result: 'WrongToken' } });
    }
    if (params.lgname !== this.username || params.lgpassword !== this.password) {
      return this.json({ login: { result: 'Failed', reason: 'Incorrect username or password entered.' } });
    }
    this.loggedIn = true;
    return this.json({ login: { result: 'Success', lguserid: 1, lgusername: this.username } });
  }

  private upload(params: Record<string, string>, fileBytes: Record<string, number>): Response {
    if (params.token !== CSRF_TOKEN) {
      return this.json({ error: { code: 'badtoken', info: 'Invalid CSRF token.' } });
    }

    if (params.stash === '1') {
      this.chunkCount += 1;
      if (this.chunkCount === this.failChunk) {
        return this.json({ error: { code: 'stashfailed', info: 'Chunk could not be stored.' } });
      }
      const key = params.filekey || `stash-${++this.stashCounter}`;
      const size = (this.stash.get(key) || 0) + (fileBytes.chunk || 0);
      this.stash.set(key, size);
      const done = size >= Number(params.filesize);
      return this.json({ upload: { result: done ? 'Success' : 'Continue', filekey: key, offset: size } });
    }

    if (params.filekey) {
      const size = this.stash.get(params.filekey);
      if (size === undefined) {
        return this.json({ error: { code: 'stashfilenotfound', info: 'File not found in stash.' } });
      }
      return this.commit(params, size);
    }

    return this.commit(params, fileBytes.file || 0);
  }

  private commit(params: Record<string, string>, size: number): Response {
    const filename = params.filename;
    if (this.existing.has(filename) && params.ignorewarnings !== '1') {
      if (this.existsAsError) {
        return this.json({ error: { code: 'fileexists-forbidden', info: `A file "${filename}" already exists.` } });
      }
      return this.json({ upload: { result: 'Warning', warnings: { exists: filename }, filekey: 'warn-key' } });
    }

    if (this.uploadWarnings && params.ignorewarnings !== '1') {
      return this.json({ upload: { result: 'Warning', warnings: this.uploadWarnings, filekey: 'warn-key' } });
    }

    this.existing.add(filename);
    this.uploads.push({ filename, text: params.text, comment: params.comment, size });
    return this.json({
      upload: {
        result: 'Success',
        filename,
        imageinfo: { descriptionurl: `https://commons.example.org/wiki/File:${filename}` },
      },
    });
  }

  private json(body: unknown, status = 200, setCookies: string[] = []): Response {
    const response = new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
    if (setCookies.length === 0) {
      return response;
    }

    const headers = new Headers({ 'Content-Type': 'application/json' });
    for (const cookie of setCookies) {
      headers.append('Set-Cookie', cookie);
    }
    Object.defineProperty(response, 'headers', { value: headers });
    return response;
  }
}
