/**
 * Serializes async tasks per key. Tasks for different keys run concurrently;
 * tasks for the same key run one at a time in arrival order.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map()

  get size(): number {
    return this.tails.size
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>(resolve => { release = resolve })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }
}
