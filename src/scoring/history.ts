/**
 * ReportHistory — fixed-capacity window of reports, oldest first.
 *
 * Capacity is part of the contract (default 60): pushing into a full window
 * evicts the oldest report.
 */

import type { TelemetryReport } from '../types.js'

export class ReportHistory {
  private readonly buffer: Array<TelemetryReport | undefined>
  private head = 0
  private count = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`)
    }
    this.buffer = new Array<TelemetryReport | undefined>(capacity)
  }

  /** Build from reports ordered oldest → newest; only the newest `capacity` survive. */
  static from(reports: readonly TelemetryReport[], capacity: number): ReportHistory {
    const history = new ReportHistory(capacity)
    for (const report of reports) history.push(report)
    return history
  }

  get length(): number {
    return this.count
  }

  push(report: TelemetryReport): void {
    const tail = (this.head + this.count) % this.capacity
    this.buffer[tail] = report
    if (this.count < this.capacity) {
      this.count++
    } else {
      this.head = (this.head + 1) % this.capacity
    }
  }

  /** Oldest → newest copy. */
  toArray(): TelemetryReport[] {
    const out: TelemetryReport[] = []
    for (let i = 0; i < this.count; i++) {
      const report = this.buffer[(this.head + i) % this.capacity]
      if (report) out.push(report)
    }
    return out
  }

  /** The newest `n` reports, oldest first. */
  last(n: number): TelemetryReport[] {
    const all = this.toArray()
    return n >= all.length ? all : all.slice(all.length - n)
  }
}
