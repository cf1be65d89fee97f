import { describeError, toAppError } from '../errors';
import { EventBus } from '../events/bus';
import { appEvent, type AppEvent, type Event } from '../events/event';
import { TaskRunner } from '../events/tasks';
import type { Logger } from '../logging';
import type { Service, ServiceContext } from '../services/service';
import { ViewStack } from '../views/stack';
import type { ViewContext } from '../views/view';

export type Phase = 'services' | 'views' | 'global';

/**
 * App-wide effects applied after services and views have seen an event.
 */
export interface GlobalContext {
  readonly stack: ViewStack;
  publish(event: AppEvent): void;
  publishEvent(event: Event): void;
  quit(): void;
}

export type GlobalHandler = (event: Event, context: GlobalContext) => void;

export interface AppOptions {
  services: Service[];
  /** collaborators handed to services; `spawn` is provided by the app */
  serviceContext: Omit<ServiceContext, 'spawn'>;
  globalHandlers: GlobalHandler[];
  logger: Logger;
  stack?: ViewStack;
  /** observes each phase as it starts; used by tests and debug logging */
  onPhase?: (phase: Phase, event: Event) => void;
}

/**
 * Owns the event channel, the view stack and the running flag, and drives
 * the dispatch loop. Each event runs through three phases in fixed order:
 * services, then views, then global handlers. Events published while one is
 * being dispatched wait their turn in the channel.
 */
export class App {
  readonly bus = new EventBus();
  readonly stack: ViewStack;

  private running = true;
  private readonly services: Service[];
  private readonly globalHandlers: GlobalHandler[];
  private readonly tasks: TaskRunner;
  private readonly serviceContext: ServiceContext;
  private readonly viewContext: ViewContext;
  private readonly globalContext: GlobalContext;
  private readonly logger: Logger;
  private readonly onPhase?: (phase: Phase, event: Event) => void;

  constructor(options: AppOptions) {
    this.stack = options.stack ?? new ViewStack();
    this.services = options.services;
    this.globalHandlers = options.globalHandlers;
    this.logger = options.logger.child('loop');
    this.onPhase = options.onPhase;

    this.tasks = new TaskRunner((event) => this.publish(event), this.logger);
    this.serviceContext = {
      ...options.serviceContext,
      spawn: (label, task) => this.tasks.spawn(label, task),
    };
    this.viewContext = { publish: (event) => this.publish(event) };
    this.globalContext = {
      stack: this.stack,
      publish: (event) => this.publish(event),
      publishEvent: (event) => this.bus.publish(event),
      quit: () => this.quit(),
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pendingTasks(): number {
    return this.tasks.size;
  }

  publish(event: AppEvent): void {
    this.bus.publish(appEvent(event));
  }

  quit(): void {
    this.running = false;
  }

  /**
   * Waits for the next event and dispatches it.
   */
  async dispatchNext(): Promise<void> {
    const event = await this.bus.next();
    this.dispatch(event);
  }

  /**
   * Dispatches queued events until the queue is empty or the app quits.
   * Returns how many were dispatched.
   */
  drain(): number {
    let count = 0;
    while (this.running) {
      const event = this.bus.tryNext();
      if (!event) break;
      this.dispatch(event);
      count++;
    }
    return count;
  }

  /**
   * Drains the queue and waits for background tasks, repeatedly, until
   * nothing is left to do.
   */
  async settle(): Promise<void> {
    do {
      this.drain();
      await this.tasks.idle();
    } while (this.running && this.bus.pending > 0);
  }

  /**
   * Runs the loop until quit. `afterDispatch` runs after every event (redraw).
   */
  async run(afterDispatch?: () => void): Promise<void> {
    while (this.running) {
      await this.dispatchNext();
      afterDispatch?.();
    }
    await this.tasks.idle();
  }

  /**
   * Processes one event through the three phases. A failure in one handler is
   * reported as an error event and does not stop the other handlers.
   */
  dispatch(event: Event): void {
    this.onPhase?.('services', event);
    for (const service of this.services) {
      if (!this.guard(event, `service ${service.name}`, () => service.handles(event))) continue;

      const followUps = this.guard(event, `service ${service.name}`, () => service.handle(event, this.serviceContext));
      for (const followUp of followUps ?? []) {
        this.publish(followUp);
      }
    }

    this.onPhase?.('views', event);
    if (event.kind === 'input') {
      this.guard(event, `view ${this.stack.top().viewType}`, () =>
        this.stack.routeInput(event.input, this.viewContext),
      );
    } else if (event.kind === 'app') {
      this.stack.broadcast(event.event, this.viewContext, (view, error) =>
        this.reportFailure(event, `view ${view.viewType}`, error),
      );
    }

    this.onPhase?.('global', event);
    for (const handler of this.globalHandlers) {
      this.guard(event, 'global', () => handler(event, this.globalContext));
    }
  }

  private guard<T>(event: Event, source: string, run: () => T): T | undefined {
    try {
      return run();
    } catch (error) {
      this.reportFailure(event, source, error);
      return undefined;
    }
  }

  private reportFailure(event: Event, source: string, error: unknown): void {
    const message = describeError(error);
    this.logger.error(`${source} failed on ${describeEvent(event)}: ${message}`);

    // An error raised while handling an error event is only logged, or a
    // broken error consumer would feed itself forever
    if (event.kind === 'app' && event.event.type === 'error') return;

    this.publish(toAppError(error, source));
  }
}

export function describeEvent(event: Event): string {
  switch (event.kind) {
    case 'tick':
      return 'tick';
    case 'input':
      return event.input.type === 'key' ? `key ${event.input.key.key}` : `mouse ${event.input.action}`;
    case 'app':
      return event.event.type;
  }
}
