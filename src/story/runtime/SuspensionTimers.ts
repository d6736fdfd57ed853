// ═══════════════════════════════════════════════════════════════════════════
// Suspension Timers - One-shot, tick-driven deadlines keyed by suspension token
// ═══════════════════════════════════════════════════════════════════════════

interface PendingTimer {
  token: number
  duration: number
  elapsed: number
  onExpire: () => void
}

/**
 * At most one deadline per suspension. A timer expires on the first update
 * that brings its elapsed time to its duration, then is removed.
 */
export class SuspensionTimers {
  private timers: Map<number, PendingTimer> = new Map()

  /** Arm a deadline for a suspension, replacing any it already had */
  start(token: number, seconds: number, onExpire: () => void): void {
    this.timers.set(token, { token, duration: Math.max(0, seconds), elapsed: 0, onExpire })
  }

  cancel(token: number): boolean {
    return this.timers.delete(token)
  }

  clear(): void {
    this.timers.clear()
  }

  has(token: number): boolean {
    return this.timers.has(token)
  }

  /** Seconds left before the deadline, or null when none is armed */
  getRemaining(token: number): number | null {
    const timer = this.timers.get(token)
    if (!timer) return null
    return Math.max(0, timer.duration - timer.elapsed)
  }

  get size(): number {
    return this.timers.size
  }

  /**
   * Advance every armed deadline. Timers armed or cancelled by an expiry
   * callback take effect from the next update.
   */
  update(deltaTime: number): void {
    for (const timer of Array.from(this.timers.values())) {
      // Cancelled or replaced earlier in this pass
      if (this.timers.get(timer.token) !== timer) continue

      timer.elapsed += deltaTime
      if (timer.elapsed < timer.duration) continue

      this.timers.delete(timer.token)
      timer.onExpire()
    }
  }
}
