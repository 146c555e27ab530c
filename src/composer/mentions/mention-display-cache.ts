export type TextDisplay =
  | { type: "plain" }
  | { type: "pill" }
  | { type: "custom"; text: string };

/** Host-supplied decision on how a mention is shown. */
export type MentionDisplayHandler = {
  resolveMentionDisplay(text: string, url: string): TextDisplay;
  resolveAtRoomMentionDisplay(): TextDisplay;
};

/**
 * Remembers every display decision for the lifetime of the editing session so
 * the host is asked at most once per `(text, url)` pair. Entries are never
 * evicted; {@link clear} is called on teardown.
 */
export class MentionDisplayCache implements MentionDisplayHandler {
  private readonly cache = new Map<string, TextDisplay>();
  private atRoomCache: TextDisplay | null = null;

  constructor(private readonly delegate: MentionDisplayHandler) {}

  get size(): number {
    return this.cache.size;
  }

  resolveMentionDisplay(text: string, url: string): TextDisplay {
    const key = JSON.stringify([text, url]);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const calculated = this.delegate.resolveMentionDisplay(text, url);
    this.cache.set(key, calculated);
    return calculated;
  }

  resolveAtRoomMentionDisplay(): TextDisplay {
    if (this.atRoomCache) {
      return this.atRoomCache;
    }

    const calculated = this.delegate.resolveAtRoomMentionDisplay();
    this.atRoomCache = calculated;
    return calculated;
  }

  delegateEquals(other: MentionDisplayHandler | null | undefined): boolean {
    return this.delegate === other;
  }

  equals(other: MentionDisplayCache): boolean {
    return other.delegateEquals(this.delegate);
  }

  clear(): void {
    this.cache.clear();
    this.atRoomCache = null;
  }
}
