/**
 * Keyed Queue
 *
 * Runs tasks one at a time per key, in submission order. Tasks under
 * different keys run concurrently.
 *
 * Usage:
 * ```typescript
 * const queue = new KeyedQueue<number>()
 * await queue.run(chatId, async () => handle(event))
 * ```
 */

export class KeyedQueue<K> {
  /** Tail of each key's chain; removed once the chain drains */
  private readonly tails = new Map<K, Promise<void>>()

  /**
   * Schedule a task behind every earlier task for the same key.
   *
   * The returned promise settles with the task's own outcome. A rejected
   * task does not stop later tasks for the key.
   */
  run<R>(key: K, task: () => Promise<R>): Promise<R> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })
    return result
  }

  /** Number of keys with queued or running tasks */
  get pending(): number {
    return this.tails.size
  }
}
