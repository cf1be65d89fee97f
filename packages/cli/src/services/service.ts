import type { GitGateway } from '../git/gateway';
import type { Logger } from '../logging';
import type { Repositories } from '../storage';
import type { ReviewSyncEngine } from '../sync/reviewSyncEngine';
import type { Clock } from '../utils/clock';
import type { AppEvent, Event } from '../events/event';

/**
 * Background work started by a service. Resolves to the events to publish
 * once it is done.
 */
export type Task = () => Promise<AppEvent[]>;

export interface ServiceContext {
  repositories: Repositories;
  git: GitGateway;
  sync: ReviewSyncEngine;
  clock: Clock;
  logger: Logger;
  /** runs `task` outside the dispatch loop; its events arrive later as ordinary events */
  spawn(label: string, task: Task): void;
}

/**
 * Business logic reacting to events during the service phase. Several services
 * may handle the same event.
 */
export interface Service {
  readonly name: string;
  handles(event: Event): boolean;
  /** returns follow-up events; they are queued, never handled inline */
  handle(event: Event, context: ServiceContext): AppEvent[];
}

/**
 * Base for services that only look at app events.
 */
export abstract class AppEventService implements Service {
  abstract readonly name: string;
  protected abstract readonly eventTypes: ReadonlySet<AppEvent['type']>;

  handles(event: Event): boolean {
    return event.kind === 'app' && this.eventTypes.has(event.event.type);
  }

  handle(event: Event, context: ServiceContext): AppEvent[] {
    return event.kind === 'app' ? this.handleAppEvent(event.event, context) : [];
  }

  protected abstract handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[];
}
