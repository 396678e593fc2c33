// src/core/session/SessionCache.ts

/**
 * In-process session tokens, one per DEP name. Owned by a SessionManager
 * instance; pass the same cache to several managers to share tokens.
 */
export class SessionCache {
  private tokens: Map<string, string> = new Map();

  get(name: string): string | undefined {
    return this.tokens.get(name);
  }

  set(name: string, token: string): void {
    this.tokens.set(name, token);
  }

  delete(name: string): boolean {
    return this.tokens.delete(name);
  }

  clear(): void {
    this.tokens.clear();
  }

  get size(): number {
    return this.tokens.size;
  }
}
