import { describe, expect, test } from 'vitest'
import { ChangeTracker } from '../../src/core/changeTracker.js'

describe('ChangeTracker', () => {
  test('starts clean', () => {
    expect(new ChangeTracker().isDirty()).toBe(false)
  })

  test('markDirty is idempotent and markClean clears', () => {
    const tracker = new ChangeTracker()
    tracker.markDirty()
    tracker.markDirty()
    expect(tracker.isDirty()).toBe(true)
    tracker.markClean()
    expect(tracker.isDirty()).toBe(false)
  })

  test('checkpoint-guarded markClean keeps later mutations dirty', () => {
    const tracker = new ChangeTracker()
    tracker.markDirty()
    const checkpoint = tracker.checkpoint()
    tracker.markDirty()

    tracker.markClean(checkpoint)
    expect(tracker.isDirty()).toBe(true)

    tracker.markClean(tracker.checkpoint())
    expect(tracker.isDirty()).toBe(false)
  })
})
