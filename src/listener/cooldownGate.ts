/**
 * Cooldown Gate
 * At most one notification per interval. Owned and used by the listener loop
 * only, so check-then-record needs no locking.
 */

export class CooldownGate {
  private lastNotifiedAt: number | null = null;

  constructor(private readonly cooldownMs: number) {}

  allow(now: number): boolean {
    return this.lastNotifiedAt === null || now - this.lastNotifiedAt >= this.cooldownMs;
  }

  record(now: number): void {
    this.lastNotifiedAt = now;
  }

  tryAcquire(now: number): boolean {
    if (!this.allow(now)) return false;
    this.record(now);
    return true;
  }

  get lastNotified(): number | null {
    return this.lastNotifiedAt;
  }
}
