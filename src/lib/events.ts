import type { Entry } from '../types/entry.js';
import type { BackgroundTasks } from './tasks.js';

export type EntryEvent =
  | { type: 'entry:created'; entry: Entry }
  | { type: 'entry:updated'; entry: Entry; previous: Entry }
  | { type: 'entry:deleted'; entry: Entry }
  | { type: 'entry:undeleted'; entry: Entry };

export type EntryEventType = EntryEvent['type'];

export type EntryEventHandler<T extends EntryEventType = EntryEventType> = (
  event: Extract<EntryEvent, { type: T }>
) => Promise<void>;

/**
 * Fans entry events out to the protocol subsystems. Handlers run as
 * background tasks: `dispatch` returns once they are scheduled, and a
 * failing handler is logged by the task tracker.
 */
export class EntryEvents {
  private readonly handlers: { [T in EntryEventType]: EntryEventHandler<T>[] } = {
    'entry:created': [],
    'entry:updated': [],
    'entry:deleted': [],
    'entry:undeleted': [],
  };

  constructor(private readonly tasks: BackgroundTasks) {}

  on<T extends EntryEventType>(type: T, handler: EntryEventHandler<T>): () => void {
    const list: EntryEventHandler<T>[] = this.handlers[type];
    list.push(handler);
    return () => {
      const index = list.indexOf(handler);
      if (index >= 0) list.splice(index, 1);
    };
  }

  dispatch(event: EntryEvent): void {
    switch (event.type) {
      case 'entry:created':
        return this.schedule(this.handlers['entry:created'], event);
      case 'entry:updated':
        return this.schedule(this.handlers['entry:updated'], event);
      case 'entry:deleted':
        return this.schedule(this.handlers['entry:deleted'], event);
      case 'entry:undeleted':
        return this.schedule(this.handlers['entry:undeleted'], event);
    }
  }

  private schedule<E extends EntryEvent>(handlers: ((event: E) => Promise<void>)[], event: E): void {
    for (const handler of handlers) {
      this.tasks.run(`${event.type} handler`, () => handler(event));
    }
  }
}
