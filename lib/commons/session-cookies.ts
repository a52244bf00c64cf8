/**
 * Cookie jar for the MediaWiki session. Only name/value pairs are kept;
 * every cookie is sent back to the one API host we talk to.
 */
export class SessionCookies {
  private cookies = new Map<string, string>();

  /**
   * Store cookies from `Set-Cookie` header values.
   */
  store(setCookieHeaders: readonly string[]): void {
    for (const header of setCookieHeaders) {
      const pair = header.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;

      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      const expired = /;\s*max-age=0(?!\d)/i.test(header) || value === 'deleted';
      if (expired) {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }

  header(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }

  get size(): number {
    return this.cookies.size;
  }
}
