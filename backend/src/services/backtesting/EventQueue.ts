import { BacktestEvent } from './types';
import { isBacktestEvent } from './events';
import { ContractViolationError } from './errors';

/**
 * FIFO buffer of pending events. Insertion order is processing order;
 * callers are responsible for enqueuing in non-decreasing timestamp order.
 */
export class EventQueue {
  private events: BacktestEvent[] = [];
  private head = 0;

  // Append event to the tail
  enqueue(event: BacktestEvent): void {
    if (!isBacktestEvent(event)) {
      throw new ContractViolationError('TYPE_CONTRACT', 'Only backtest events can be added to the EventQueue');
    }
    this.events.push(event);
  }

  // Remove and return the head, or null when empty
  dequeue(): BacktestEvent | null {
    if (this.head >= this.events.length) return null;

    const event = this.events[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the buffer
    if (this.head > 64 && this.head * 2 >= this.events.length) {
      this.events = this.events.slice(this.head);
      this.head = 0;
    }
    return event;
  }

  peek(): BacktestEvent | null {
    return this.head < this.events.length ? this.events[this.head] : null;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  size(): number {
    return this.events.length - this.head;
  }

  clear(): void {
    this.events = [];
    this.head = 0;
  }
}
