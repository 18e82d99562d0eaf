/**
 * Per-room broadcast sequence numbers
 *
 * Each chat room gets a counter starting at 1 so clients can order frames
 * and spot gaps. Counters live in process memory and restart with it.
 */
export class RoomSequencer {
  private counters = new Map<string, number>();

  next(room: string): number {
    const value = (this.counters.get(room) ?? 0) + 1;
    this.counters.set(room, value);
    return value;
  }

  current(room: string): number {
    return this.counters.get(room) ?? 0;
  }

  /** Forget a room, e.g. once nobody is connected to it */
  reset(room: string): void {
    this.counters.delete(room);
  }

  get size(): number {
    return this.counters.size;
  }
}
