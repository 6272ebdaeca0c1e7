import { WatchlistManager } from '@services/position-sync/watchlist/index.js'
import { describe, expect, it } from 'vitest'

const none = new Set<string>()

describe('watchlist-manager', () => {
  describe('admitCandidates', () => {
    it('should admit books active on either side', () => {
      const watchlist = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })

      const candidates = watchlist.admitCandidates(
        new Set(['A1', 'B2']),
        new Set(['B2', 'C3']),
        0,
      )

      expect([...candidates].sort()).toEqual(['A1', 'B2', 'C3'])
      expect(watchlist.get('A1')).toEqual({
        bookId: 'A1',
        lastActiveAt: 0,
        expiresAt: 1000,
      })
    })

    it('should keep a book for exactly the retention window', () => {
      const watchlist = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })
      watchlist.admitCandidates(new Set(['A1']), none, 0)

      expect(watchlist.admitCandidates(none, none, 1000).has('A1')).toBe(true)
      expect(watchlist.admitCandidates(none, none, 1001).has('A1')).toBe(false)
    })

    it('should extend retention when a book shows up again', () => {
      const watchlist = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })
      watchlist.admitCandidates(new Set(['A1']), none, 0)
      watchlist.admitCandidates(none, new Set(['A1']), 900)

      expect(watchlist.admitCandidates(none, none, 1800).has('A1')).toBe(true)
    })

    it('should evict the least recently active books over the size limit', () => {
      const watchlist = new WatchlistManager({ retentionMs: 10_000, maxSize: 2 })
      watchlist.admitCandidates(new Set(['OLD']), none, 0)
      watchlist.admitCandidates(new Set(['MID']), none, 100)

      const candidates = watchlist.admitCandidates(new Set(['NEW']), none, 200)

      expect([...candidates].sort()).toEqual(['MID', 'NEW'])
      expect(watchlist.size).toBe(2)
    })
  })

  describe('touch', () => {
    it('should refresh activity of a current candidate', () => {
      const watchlist = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })
      watchlist.admitCandidates(new Set(['A1']), none, 0)

      watchlist.touch('A1', 500)

      expect(watchlist.get('A1')?.expiresAt).toBe(1500)
    })

    it('should ignore books that are not candidates and older times', () => {
      const watchlist = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })
      watchlist.admitCandidates(new Set(['A1']), none, 500)

      watchlist.touch('A1', 100)
      watchlist.touch('Z9', 600)

      expect(watchlist.get('A1')?.lastActiveAt).toBe(500)
      expect(watchlist.has('Z9')).toBe(false)
    })
  })

  describe('drop', () => {
    it('should keep a dropped book out for one retention window', () => {
      const watchlist = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })
      watchlist.admitCandidates(new Set(['A1']), none, 0)

      watchlist.drop('A1', 100, 'not found')

      expect(watchlist.has('A1')).toBe(false)
      expect(watchlist.admitCandidates(new Set(['A1']), none, 1099).has('A1')).toBe(
        false,
      )
      expect(watchlist.isSuppressed('A1')).toBe(true)

      expect(watchlist.admitCandidates(new Set(['A1']), none, 1100).has('A1')).toBe(
        true,
      )
      expect(watchlist.isSuppressed('A1')).toBe(false)
    })
  })

  describe('snapshot', () => {
    it('should restore entries and suppressions from a snapshot', () => {
      const original = new WatchlistManager({ retentionMs: 1000, maxSize: 10 })
      original.admitCandidates(new Set(['A1', 'B2']), none, 0)
      original.drop('B2', 0, 'gone')

      const restored = new WatchlistManager(
        { retentionMs: 1000, maxSize: 10 },
        original.snapshot(),
      )

      expect(restored.snapshot()).toEqual({
        watchlist: { A1: { bookId: 'A1', lastActiveAt: 0, expiresAt: 1000 } },
        suppressed: { B2: { bookId: 'B2', until: 1000, reason: 'gone' } },
      })
    })
  })
})
