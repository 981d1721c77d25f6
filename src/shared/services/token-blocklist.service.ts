/**
 * Revoked JWT ids, kept until the token would have expired anyway.
 * Process-local: a restart forgets revocations, which only matters for
 * tokens that are still inside their lifetime.
 */
export class TokenBlocklist {
  private readonly revoked = new Map<string, number>();

  constructor(private readonly now: () => number = () => Math.floor(Date.now() / 1000)) {}

  revoke(jti: string, expiresAt: number): void {
    this.prune();
    this.revoked.set(jti, expiresAt);
  }

  isRevoked(jti: string): boolean {
    const expiresAt = this.revoked.get(jti);
    if (expiresAt === undefined) return false;
    if (expiresAt <= this.now()) {
      this.revoked.delete(jti);
      return false;
    }
    return true;
  }

  get size(): number {
    return this.revoked.size;
  }

  private prune(): void {
    const now = this.now();
    for (const [jti, expiresAt] of this.revoked) {
      if (expiresAt <= now) this.revoked.delete(jti);
    }
  }
}

export const tokenBlocklist = new TokenBlocklist();
