import { NOTIFICATION_COOLDOWN_MS } from '../common/time.constants';
import { Clock } from './shared-stats';

/**
 * Global cooldown between outbound notifications.
 *
 * The first alert always passes. After that an alert passes only once more
 * than `cooldownMs` has elapsed since the last one that passed; rejected
 * checks leave the state untouched. The cooldown is shared by every rule.
 *
 * `shouldNotify` checks and updates in one synchronous call, so two alerts
 * handled back to back can never both pass inside the same window.
 */
export class NotificationGate {
  private lastSentMs: number | null = null;

  constructor(
    private readonly cooldownMs: number = NOTIFICATION_COOLDOWN_MS,
    private readonly clock: Clock = Date.now,
  ) {}

  shouldNotify(): boolean {
    const now = this.clock();

    if (this.lastSentMs === null || now - this.lastSentMs > this.cooldownMs) {
      this.lastSentMs = now;
      return true;
    }

    return false;
  }

  get lastSentAt(): Date | null {
    return this.lastSentMs === null ? null : new Date(this.lastSentMs);
  }
}
