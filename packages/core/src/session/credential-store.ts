/**
 * Per-session holder of the bearer credential.
 */

export type BearerCredential = {
  token: string;
  /** Epoch milliseconds; absent when the token does not expire */
  expiresAt?: number;
  scope?: string;
};

export class CredentialStore {
  private credential: BearerCredential | null = null;

  set(credential: BearerCredential) {
    this.credential = { ...credential };
  }

  /**
   * Returns the credential if present and not past its expiry.
   */
  get(now: number = Date.now()): BearerCredential | null {
    if (!this.credential) return null;
    if (
      this.credential.expiresAt !== undefined &&
      this.credential.expiresAt <= now
    ) {
      return null;
    }
    return this.credential;
  }

  has(now: number = Date.now()) {
    return this.get(now) !== null;
  }

  get expiresAt(): number | undefined {
    return this.credential?.expiresAt;
  }

  clear() {
    this.credential = null;
  }
}
