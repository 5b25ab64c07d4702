/**
 * Domain event dispatcher: fans out committed events to listeners.
 */
import type { ExpenseDomainEvent } from '../types/expense-contract.js';
import { createChildLogger } from '../logging.js';

export type DomainEventListener = (event: ExpenseDomainEvent) => Promise<void>;

export interface EventDispatcher {
  dispatch(event: ExpenseDomainEvent): Promise<void>;
}

export class DomainEventDispatcher implements EventDispatcher {
  private listeners: DomainEventListener[] = [];

  addListener(listener: DomainEventListener): void {
    this.listeners.push(listener);
  }

  async dispatch(event: ExpenseDomainEvent): Promise<void> {
    const results = await Promise.allSettled(this.listeners.map((fn) => fn(event)));
    for (const result of results) {
      if (result.status === 'rejected') {
        createChildLogger({ component: 'event-dispatcher' }).error(
          { err: result.reason, eventType: event.type, expenseId: event.expenseId },
          'Domain event listener failed'
        );
      }
    }
  }
}
