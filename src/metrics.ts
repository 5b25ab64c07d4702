/**
 * Prometheus metrics for the expense workflow
 *
 * Counters and the approval latency histogram, fed by DomainEventDispatcher listeners.
 */
import client from 'prom-client';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { DomainEventDispatcher } from './core/event-dispatcher.js';
import type { ExpenseDomainEvent } from './types/expense-contract.js';

export const metricsRegistry = new client.Registry();

// Default Node.js metrics (event loop lag, heap, GC, etc.)
client.collectDefaultMetrics({ register: metricsRegistry });

export const transitionsTotal = new client.Counter({
  name: 'expense_transitions_total',
  help: 'Committed expense mutations by audit action',
  labelNames: ['action'] as const,
  registers: [metricsRegistry],
});

export const businessRuleViolationsTotal = new client.Counter({
  name: 'expense_business_rule_violations_total',
  help: 'Rejected business rules by service operation',
  labelNames: ['operation'] as const,
  registers: [metricsRegistry],
});

export const approvalLatencySeconds = new client.Histogram({
  name: 'expense_approval_latency_seconds',
  help: 'Time from submission to approval or rejection (seconds)',
  buckets: [60, 300, 900, 1800, 3600, 7200, 14400, 43200, 86400, 259200],
  registers: [metricsRegistry],
});

// Track submission timestamps for approval latency calculation
const submittedAt = new Map<string, number>();

const instrumented = new WeakSet<DomainEventDispatcher>();

/**
 * Wire metrics listeners to a DomainEventDispatcher. Repeated calls for
 * the same dispatcher are no-ops.
 */
export function attachMetricsListeners(dispatcher: DomainEventDispatcher): void {
  if (instrumented.has(dispatcher)) return;
  instrumented.add(dispatcher);

  dispatcher.addListener(async (event: ExpenseDomainEvent) => {
    switch (event.type) {
      case 'expense.submitted':
        submittedAt.set(event.expenseId, Date.parse(event.occurredAt));
        break;

      case 'expense.approved':
      case 'expense.rejected': {
        const submittedTs = submittedAt.get(event.expenseId);
        if (submittedTs !== undefined) {
          approvalLatencySeconds.observe((Date.parse(event.occurredAt) - submittedTs) / 1000);
          submittedAt.delete(event.expenseId);
        }
        break;
      }
    }
  });
}

/**
 * Returns the Prometheus text format metrics string.
 */
export async function getMetricsText(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Returns the content type for Prometheus metrics.
 */
export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}

/**
 * Start a dedicated metrics HTTP server on the given port.
 * Returns a handle to close the server.
 */
export function startMetricsServer(port: number): { close: () => Promise<void> } {
  const metricsApp = new Hono();
  metricsApp.get('/metrics', async (c) => {
    const text = await getMetricsText();
    return c.text(text, 200, { 'Content-Type': getMetricsContentType() });
  });

  const server = serve({ fetch: metricsApp.fetch, port });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err?: Error) => (err ? reject(err) : resolve()));
      }),
  };
}
