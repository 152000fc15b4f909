/**
 * Tracks which instances each in-flight message id has reached.
 *
 * An entry lives while something holds it: an active send frame, a queued
 * copy on a locked instance, or a pending async handler. When the last hold
 * is released the entry is discarded.
 */
export class VisitTracker {
  private entries = new Map<number, { visited: Set<string>; holds: number }>();

  hold(messageId: number): void {
    const entry = this.entries.get(messageId);
    if (entry) {
      entry.holds += 1;
    } else {
      this.entries.set(messageId, { visited: new Set(), holds: 1 });
    }
  }

  release(messageId: number): void {
    const entry = this.entries.get(messageId);
    if (!entry) return;
    entry.holds -= 1;
    if (entry.holds <= 0) {
      this.entries.delete(messageId);
    }
  }

  hasVisited(messageId: number, instanceId: string): boolean {
    return this.entries.get(messageId)?.visited.has(instanceId) ?? false;
  }

  markVisited(messageId: number, instanceId: string): void {
    this.entries.get(messageId)?.visited.add(instanceId);
  }

  /**
   * Number of message ids currently tracked
   */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
