import fs from 'fs-extra'
import { throttle } from 'lodash-es'
import { createConditionalLogger } from './LoggingConfig'

const logger = createConditionalLogger('storage')

export class Storage<T = unknown> {
  private file: string
  private data: Record<string, T>
  private save: ReturnType<typeof throttle<() => void>>
  private pending: Promise<void> = Promise.resolve()
  private dirty = false

  constructor(file: string, wait = 1000) {
    this.file = file
    try {
      this.data = fs.readJsonSync(this.file)
    } catch (_err) {
      // missing or unreadable file starts empty
      this.data = {}
    }
    this.save = throttle(() => {
      this.pending = this.persist()
    }, wait, { leading: true, trailing: true })
  }

  get path(): string {
    return this.file
  }

  get(key: string): T | undefined {
    return this.data[key]
  }

  has(key: string): boolean {
    return key in this.data
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  set(key: string, value: T): void {
    if (value !== undefined) {
      this.data[key] = value
      this.dirty = true
      this.save()
    }
  }

  async persist(): Promise<void> {
    this.dirty = false
    try {
      await fs.outputJson(this.file, this.data, { spaces: 2 })
    } catch (err) {
      logger.error(`failed to persist storage to ${this.file}`, err)
    }
  }

  /**
   * Write any throttled change immediately and wait for it to land
   */
  async flush(): Promise<void> {
    this.save.cancel()
    await this.pending
    if (this.dirty) {
      await this.persist()
    }
  }
}
