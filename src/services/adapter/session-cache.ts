/**
 * Last known good executable path for one host session.
 *
 * Owned by the caller and passed to each resolution. A cached path is only a
 * hint: it is reused after checking that the file still exists and that the
 * installed version equals the resolved target.
 */
export class SessionPathCache {
  private path: string | null = null;

  get(): string | null {
    return this.path;
  }

  set(path: string): void {
    this.path = path;
  }
}
