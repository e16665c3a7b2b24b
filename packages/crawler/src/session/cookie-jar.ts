import { CookieJar as ToughCookieJar } from 'tough-cookie';
import { isValidUrl } from '../utils/url.js';

/**
 * Cookie store for one connection context. Cookies are scoped by the
 * domain, path and security attributes of the response that set them.
 */
export class CookieJar {
  private readonly jar: ToughCookieJar;

  constructor() {
    this.jar = new ToughCookieJar();
  }

  /** Name/value pairs of the cookies due for a request to `url`. */
  cookiesFor(url: string, now = new Date()): Record<string, string> {
    if (!isValidUrl(url)) {
      return {};
    }

    const cookies = this.jar.getCookiesSync(url, { now });
    return Object.fromEntries(cookies.map((cookie) => [cookie.key, cookie.value]));
  }

  /**
   * Stores the cookies of `Set-Cookie` header values received from `url`.
   * Lines the jar rejects (malformed, or for a foreign domain) are skipped.
   * Returns how many were stored.
   */
  absorb(
    setCookie: string | readonly string[] | undefined,
    url: string,
    now = new Date(),
  ): number {
    if (setCookie === undefined || !isValidUrl(url)) {
      return 0;
    }

    const lines = typeof setCookie === 'string' ? [setCookie] : setCookie;
    let absorbed = 0;

    for (const line of lines) {
      const stored = this.jar.setCookieSync(line, url, { now, ignoreError: true });
      if (stored) {
        absorbed += 1;
      }
    }

    return absorbed;
  }
}
