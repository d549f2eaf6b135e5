/**
 * Terminal progress line for long-running lookups.
 * Animates on a TTY; elsewhere only the final status line is written.
 */

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']
const SPINNER_INTERVAL = 80 // ms

export interface SpinnerOptions {
  /** Stream to write to (default: process.stderr) */
  stream?: NodeJS.WriteStream
  /** Disable output entirely (for JSON output) */
  disabled?: boolean
}

export class Spinner {
  private stream: NodeJS.WriteStream
  private frameIndex = 0
  private text = ''
  private timer: ReturnType<typeof setInterval> | null = null
  private disabled: boolean

  constructor(options: SpinnerOptions = {}) {
    this.stream = options.stream ?? process.stderr
    this.disabled = options.disabled ?? false
  }

  get isSpinning(): boolean {
    return this.timer !== null
  }

  start(text?: string): this {
    if (this.disabled) return this
    if (this.timer) {
      this.stop()
    }

    this.text = text ?? ''
    this.frameIndex = 0
    this.render()

    if (this.stream.isTTY) {
      this.timer = setInterval(() => {
        this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length
        this.render()
      }, SPINNER_INTERVAL)
      // Never keep the process alive for the animation
      this.timer.unref()
    }
    return this
  }

  update(text: string): this {
    if (this.disabled) return this
    this.text = text
    this.render()
    return this
  }

  /**
   * Show "<label> (done/total)"
   */
  progress(label: string, done: number, total: number): this {
    return this.update(`${label} (${done}/${total})`)
  }

  stop(): this {
    this.clearTimer()
    this.clear()
    return this
  }

  succeed(text?: string): this {
    this.stopWithSymbol('✓', text)
    return this
  }

  fail(text?: string): this {
    this.stopWithSymbol('✗', text)
    return this
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  private clear(): void {
    if (this.disabled || !this.stream.isTTY) return
    this.stream.write('\r\x1b[K')
  }

  private render(): void {
    if (!this.stream.isTTY) return
    const frame = SPINNER_FRAMES[this.frameIndex]
    const line = this.text ? `${frame} ${this.text}` : frame
    this.stream.write(`\r\x1b[K${line}`)
  }

  private stopWithSymbol(symbol: string, text?: string): void {
    this.clearTimer()
    if (this.disabled) return

    const finalText = text ?? this.text
    if (!finalText) {
      this.clear()
      return
    }
    const prefix = this.stream.isTTY ? '\r\x1b[K' : ''
    this.stream.write(`${prefix}${symbol} ${finalText}\n`)
  }
}

export function createSpinner(options?: SpinnerOptions): Spinner {
  return new Spinner(options)
}
