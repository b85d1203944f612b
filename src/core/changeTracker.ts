/**
 * Core Layer - Change Tracker
 *
 * Dirty flag for the value owned by a file handle. Every mutation bumps a
 * version so that a save can tell whether the bytes it wrote still match
 * memory when it finishes.
 */

export class ChangeTracker {
  #dirty = false
  #version = 0

  markDirty(): void {
    this.#dirty = true
    this.#version++
  }

  isDirty(): boolean {
    return this.#dirty
  }

  /** Version to hand back to `markClean` once the write completes. */
  checkpoint(): number {
    return this.#version
  }

  /**
   * Clear the flag. With a checkpoint, only clears when nothing was mutated
   * after the checkpoint was taken.
   */
  markClean(checkpoint?: number): void {
    if (checkpoint !== undefined && checkpoint !== this.#version) return
    this.#dirty = false
  }
}
