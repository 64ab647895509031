import cliProgress from 'cli-progress'

import type { CollectProgress } from '../threads/collector.js'

/**
 * Configuration for progress bar display
 */
export type ProgressConfig = {
  /** Disable progress bars entirely */
  quiet?: boolean
  /** Custom format string for progress bars */
  format?: string
  /** Width of progress bar in characters (default: 40) */
  barSize?: number
  /** Frequency of progress updates in ms (default: 500) */
  updateFrequency?: number
}

/** The part of a cli-progress bar the manager drives */
export type ProgressBar = Pick<cliProgress.SingleBar, 'update' | 'stop' | 'setTotal'>

const noopBar: ProgressBar = {
  update: () => {},
  stop: () => {},
  setTotal: () => {},
}

type TrackedBar = { bar: ProgressBar; value: number; total: number }

/**
 * Progress bars for the export stages, rendered to stderr so stdout stays
 * machine-readable
 */
export class ProgressManager {
  private multiBar: cliProgress.MultiBar | null = null
  private readonly bars = new Map<string, TrackedBar>()
  private readonly isQuiet: boolean
  private readonly format: string
  private readonly barSize: number
  private readonly updateFrequency: number

  constructor(config: ProgressConfig = {}) {
    this.isQuiet = config.quiet ?? false
    this.barSize = config.barSize ?? 40
    this.updateFrequency = config.updateFrequency ?? 500
    // Fetch posts [████████░░░░] 35% | 35/100 | ETA: 12s | page 2
    this.format =
      config.format ?? `{name} [{bar}] {percentage}% | {value}/{total} | ETA: {eta}s | {current}`
  }

  public createBar(name: string, total: number): ProgressBar {
    if (this.isQuiet) {
      this.bars.set(name, { bar: noopBar, value: 0, total })
      return noopBar
    }

    if (!this.multiBar) {
      this.multiBar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: this.format,
          barCompleteChar: '█',
          barIncompleteChar: '░',
          barsize: this.barSize,
          fps: 1000 / this.updateFrequency,
          stream: process.stderr,
        },
        cliProgress.Presets.shades_classic,
      )
    }

    const bar = this.multiBar.create(total, 0, {
      name: this.padName(name),
      current: 'starting...',
    })
    this.bars.set(name, { bar, value: 0, total })
    return bar
  }

  public increment(barName: string, value: number = 1, current?: string): void {
    const tracked = this.bars.get(barName)
    if (!tracked) return
    this.setProgress(barName, tracked.value + value, current)
  }

  public setProgress(barName: string, value: number, current?: string): void {
    const tracked = this.bars.get(barName)
    if (!tracked) return
    tracked.value = Math.min(value, tracked.total)
    tracked.bar.update(tracked.value, current ? { current: this.truncate(current, 40) } : {})
  }

  public setTotal(barName: string, total: number): void {
    const tracked = this.bars.get(barName)
    if (!tracked) return
    tracked.total = total
    tracked.bar.setTotal(total)
  }

  public stopBar(barName: string): void {
    this.bars.get(barName)?.bar.stop()
    this.bars.delete(barName)
  }

  public stopAll(): void {
    for (const name of [...this.bars.keys()]) {
      this.stopBar(name)
    }
    this.multiBar?.stop()
    this.multiBar = null
  }

  /** Current value of a bar (0 to total) */
  public getProgress(barName: string): number {
    return this.bars.get(barName)?.value ?? 0
  }

  public getTotal(barName: string): number {
    return this.bars.get(barName)?.total ?? 0
  }

  public isVisible(): boolean {
    return !this.isQuiet
  }

  private padName(name: string): string {
    const maxLen = 16
    if (name.length >= maxLen) {
      return name.substring(0, maxLen - 3) + '...'
    }
    return name.padEnd(maxLen)
  }

  private truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) {
      return str
    }
    return str.substring(0, maxLen - 3) + '...'
  }
}

export const PROGRESS_BARS = {
  insights: 'Fetch insights',
  upload: 'Upload batches',
} as const

/**
 * Collector progress → bars
 */
export function collectProgressHandler(
  manager: ProgressManager,
): (progress: CollectProgress) => void {
  return (progress) => {
    if (progress.stage === 'fetch') return
    if (manager.getTotal(PROGRESS_BARS.insights) === 0) {
      manager.createBar(PROGRESS_BARS.insights, progress.total)
    }
    manager.setProgress(PROGRESS_BARS.insights, progress.done, `${progress.done} posts`)
    if (progress.done >= progress.total) manager.stopBar(PROGRESS_BARS.insights)
  }
}

/**
 * Exporter batch progress → bars
 */
export function uploadProgressHandler(
  manager: ProgressManager,
): (batch: number, total: number) => void {
  return (batch, total) => {
    if (manager.getTotal(PROGRESS_BARS.upload) === 0) {
      manager.createBar(PROGRESS_BARS.upload, total)
    }
    manager.setProgress(PROGRESS_BARS.upload, batch, `batch ${batch}/${total}`)
    if (batch >= total) manager.stopBar(PROGRESS_BARS.upload)
  }
}

/**
 * Progress manager with common defaults; bars only render on a terminal
 */
export function createProgressManager(quiet = false): ProgressManager {
  return new ProgressManager({ quiet: quiet || !process.stderr.isTTY })
}
