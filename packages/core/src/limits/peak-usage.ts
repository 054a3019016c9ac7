import type { PeakRecorder } from '../types'

/**
 * Peak recursion depth and backtrack-step count observed across match calls.
 *
 * Peaks accumulate until {@link PeakUsage.reset} is called; a new match call
 * does not clear them.
 *
 * @public
 */
export class PeakUsage implements PeakRecorder {
  private maxDepth = 0
  private maxSteps = 0

  /** Deepest recursion level entered */
  get recursion(): number {
    return this.maxDepth
  }

  /** Highest backtrack-step count reached within a single call */
  get backtrack(): number {
    return this.maxSteps
  }

  recordDepth(depth: number): void {
    if (depth > this.maxDepth) {
      this.maxDepth = depth
    }
  }

  recordSteps(steps: number): void {
    if (steps > this.maxSteps) {
      this.maxSteps = steps
    }
  }

  /** Clear both peaks */
  reset(): void {
    this.maxDepth = 0
    this.maxSteps = 0
  }
}
