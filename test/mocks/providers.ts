import type { Side } from '@root/types/position-sync.types.js'
import type {
  ActiveItem,
  PositionProvider,
  PositionReading,
  ProviderRegistry,
} from '@root/types/provider.types.js'

/**
 * In-memory platform for exercising the sync engine without HTTP.
 *
 * `progress` holds what the platform would report for each book; books in
 * `active` also show up in the activity listing. Writes land in `progress`
 * so the next read sees them, like the real platforms. `reads` records every
 * book asked for and `readBatches` how they were grouped.
 */
export class FakeProvider implements PositionProvider {
  readBatchSize = 1
  readonly progress = new Map<string, PositionReading>()
  readonly active = new Set<string>()
  readonly writes: Array<{ bookId: string; positionSeconds: number }> = []
  readonly reads: string[] = []
  readonly readBatches: string[][] = []

  listError: Error | null = null
  readError: Error | null = null
  writeError: Error | null = null
  onRead: (() => void) | null = null
  onWrite: (() => void) | null = null

  constructor(readonly side: Side) {}

  /**
   * Sets a book's progress and marks it recently active
   */
  play(bookId: string, reading: PositionReading): void {
    this.progress.set(bookId, reading)
    this.active.add(bookId)
  }

  async listActiveItems(): Promise<ActiveItem[]> {
    if (this.listError) throw this.listError

    const items: ActiveItem[] = []
    for (const bookId of this.active) {
      const reading = this.progress.get(bookId)
      if (reading) items.push({ bookId, ...reading })
    }
    return items
  }

  async getPositions(
    bookIds: readonly string[],
  ): Promise<Map<string, PositionReading>> {
    this.reads.push(...bookIds)
    this.readBatches.push([...bookIds])
    this.onRead?.()
    if (this.readError) throw this.readError

    const readings = new Map<string, PositionReading>()
    for (const bookId of bookIds) {
      const reading = this.progress.get(bookId)
      if (reading) readings.set(bookId, { ...reading })
    }
    return readings
  }

  async setPosition(bookId: string, positionSeconds: number): Promise<void> {
    if (this.writeError) throw this.writeError

    this.writes.push({ bookId, positionSeconds })
    this.progress.set(bookId, {
      ...this.progress.get(bookId),
      positionSeconds,
    })
    this.onWrite?.()
  }
}

export function createFakeProviders(): {
  audible: FakeProvider
  abs: FakeProvider
  registry: ProviderRegistry
} {
  const audible = new FakeProvider('audible')
  const abs = new FakeProvider('abs')
  return { audible, abs, registry: { audible, abs } }
}
