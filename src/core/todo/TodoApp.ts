import type { OutboundMessage } from '../../ports/EmailPort.js';
import type { InputCollector } from '../capture/InputCollector.js';
import type { SuggestionEnricher } from '../enrich/SuggestionEnricher.js';
import type { DeliverySender } from '../delivery/DeliverySender.js';
import { createLogger } from '../../utils/logger.js';
import { UsageError } from '../../utils/errors.js';
import { SUBJECT_PREFIX, type TodoItem, type TodoOutcome } from './types.js';

export interface TodoAppDeps {
  collector: InputCollector;
  sender: DeliverySender;
  /** Absent when no completion client is configured. */
  enricher?: SuggestionEnricher;
  identity: { person: string; email: string };
  inbox: string;
}

export function createTodoItem(title: string): TodoItem {
  if (!title.trim()) {
    throw new UsageError('missing todo subject.');
  }
  return { title, subject: `${SUBJECT_PREFIX}${title}`, lines: [] };
}

export function composeBody(item: TodoItem): string {
  if (item.lines.length === 0) {
    return item.subject;
  }
  return [item.title, ...item.lines].join('\n');
}

export function formatSender(identity: { person: string; email: string }): string {
  return `${identity.person} <${identity.email}>`;
}

export class TodoApp {
  private readonly logger = createLogger({ component: 'TodoApp' });

  constructor(private readonly deps: TodoAppDeps) {}

  async run(title: string): Promise<TodoOutcome> {
    const item = createTodoItem(title);

    const { lines, completed } = await this.deps.collector.collect();
    if (!completed) {
      return { status: 'cancelled' };
    }
    item.lines.push(...lines);

    let text = composeBody(item);
    if (this.deps.enricher) {
      text = await this.deps.enricher.enrich(text);
    }

    const message: OutboundMessage = {
      from: formatSender(this.deps.identity),
      to: this.deps.inbox,
      subject: item.subject,
      text,
    };
    this.logger.debug({ subject: message.subject, lines: item.lines.length }, 'Sending TODO');

    const receipt = await this.deps.sender.send(message);
    return { status: 'sent', attempts: receipt.attempts, id: receipt.id };
  }
}
