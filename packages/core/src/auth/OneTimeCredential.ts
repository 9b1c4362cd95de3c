/**
 * Holds a freshly generated plaintext credential until it has been shown to the
 * operator once. `reveal()` hands it out and drops the reference.
 */
export class OneTimeCredential {
  private value: string | null;

  constructor(value: string) {
    this.value = value;
  }

  reveal(): string | null {
    const value = this.value;
    this.value = null;
    return value;
  }

  isRevealed(): boolean {
    return this.value === null;
  }

  toJSON(): string {
    return '[redacted]';
  }

  toString(): string {
    return '[redacted]';
  }
}
