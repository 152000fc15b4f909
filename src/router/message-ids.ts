/**
 * Monotonic message id source, one per bus
 */
export class MessageIdSource {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }

  get current(): number {
    return this.last;
  }
}
