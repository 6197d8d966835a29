/**
 * Re-entrant lock shared by every tracking collection of one engine.
 *
 * Critical sections are synchronous, so a section always runs to completion
 * before another task on the event loop can enter. The depth counter lets a
 * section call into helpers that take the lock again.
 */
export class RegistryLock {
  private depth = 0

  /**
   * Runs `section` while holding the lock and returns its result.
   *
   * @throws Error if `section` returns a promise
   */
  runExclusive<T>(section: () => T): T {
    this.depth++
    try {
      const result = section()
      if (result instanceof Promise) {
        throw new Error('Registry critical sections must be synchronous')
      }
      return result
    } finally {
      this.depth--
    }
  }

  /** True while a critical section is executing */
  isHeld(): boolean {
    return this.depth > 0
  }
}
