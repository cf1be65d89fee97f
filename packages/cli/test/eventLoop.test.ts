import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { App, describeEvent, type GlobalHandler, type Phase } from '../src/app/app';
import { navigationHandler } from '../src/app/navigation';
import { InvalidStateError } from '../src/errors';
import { EventBus } from '../src/events/bus';
import { appEvent, inputEvent, tickEvent, type AppEvent, type Event } from '../src/events/event';
import { keyInput, type KeyInput } from '../src/keyboard/keys';
import { silentLogger } from '../src/logging';
import type { Service, ServiceContext } from '../src/services';
import { ViewStack } from '../src/views/stack';
import type { View, ViewRender, ViewType } from '../src/views/view';
import { createTestContext, type TestContext } from './helpers';

class RecordingView implements View {
  constructor(
    readonly name: string,
    private readonly log: string[],
    readonly viewType: ViewType = 'help_modal',
    private readonly failOnAppEvent = false,
  ) {}

  handleKey(key: KeyInput): void {
    this.log.push(`${this.name}:key ${key.key}`);
  }

  handleAppEvent(event: AppEvent): void {
    this.log.push(`${this.name}:${event.type}`);
    if (this.failOnAppEvent) throw new Error(`${this.name} broke`);
  }

  keybindings() {
    return [];
  }

  render(): ViewRender {
    return { title: this.name, lines: [], modal: false };
  }
}

function recordingService(
  log: string[],
  respond: (event: AppEvent, context: ServiceContext) => AppEvent[] = () => [],
): Service {
  return {
    name: 'recorder',
    handles: (event) => event.kind === 'app',
    handle: (event, context) => {
      if (event.kind !== 'app') return [];
      log.push(`service:${event.event.type}`);
      return respond(event.event, context);
    },
  };
}

describe('App dispatch loop', () => {
  let ctx: TestContext;
  let log: string[];

  beforeEach(async () => {
    ctx = await createTestContext();
    log = [];
  });

  afterEach(() => {
    ctx.database.close();
  });

  function createApp(options: {
    services?: Service[];
    globalHandlers?: GlobalHandler[];
    stack?: ViewStack;
    onPhase?: (phase: Phase, event: Event) => void;
  }): App {
    return new App({
      services: options.services ?? [],
      serviceContext: { ...ctx, logger: silentLogger },
      globalHandlers: options.globalHandlers ?? [],
      logger: silentLogger,
      stack: options.stack ?? new ViewStack(new RecordingView('main', log, 'main')),
      onPhase: options.onPhase,
    });
  }

  const recordGlobal: GlobalHandler = (event) => {
    log.push(`global:${describeEvent(event)}`);
  };

  it('runs services, then views, then global handlers', () => {
    const phases: Phase[] = [];
    const app = createApp({
      services: [recordingService(log)],
      globalHandlers: [recordGlobal],
      onPhase: (phase) => phases.push(phase),
    });

    app.publish({ type: 'init' });
    expect(app.drain()).toBe(1);

    expect(phases).toEqual(['services', 'views', 'global']);
    expect(log).toEqual(['service:init', 'main:init', 'global:init']);
  });

  it('queues follow-up events behind the current one', () => {
    const app = createApp({
      services: [recordingService(log, (event) => (event.type === 'init' ? [{ type: 'reviews_load' }] : []))],
      globalHandlers: [recordGlobal],
    });

    app.publish({ type: 'init' });
    app.publish({ type: 'quit' });
    app.drain();

    expect(log).toEqual([
      'service:init',
      'main:init',
      'global:init',
      'service:quit',
      'main:quit',
      'global:quit',
      'service:reviews_load',
      'main:reviews_load',
      'global:reviews_load',
    ]);
  });

  it('does not show a view pushed by a global handler the event that pushed it', () => {
    const app = createApp({
      globalHandlers: [
        (event, context) => {
          if (event.kind === 'app' && event.event.type === 'review_create_open') {
            context.stack.push(new RecordingView('pushed', log));
          }
        },
      ],
    });

    app.publish({ type: 'review_create_open' });
    app.publish({ type: 'init' });
    app.drain();

    expect(log).toEqual(['main:review_create_open', 'pushed:init', 'main:init']);
  });

  it('routes input to the top view only and app events to every view', () => {
    const stack = new ViewStack(new RecordingView('main', log, 'main'));
    stack.push(new RecordingView('top', log));
    const app = createApp({ stack });

    app.bus.publish(inputEvent({ type: 'key', key: keyInput('x') }));
    app.publish({ type: 'init' });
    app.drain();

    expect(log).toEqual(['top:key x', 'top:init', 'main:init']);
  });

  it('turns a failing service into an error event and keeps going', () => {
    const errors: AppEvent[] = [];
    const failing: Service = {
      name: 'boom',
      handles: () => true,
      handle: () => {
        throw new InvalidStateError('nothing to do');
      },
    };
    const app = createApp({
      services: [failing, recordingService(log)],
      globalHandlers: [
        (event) => {
          if (event.kind === 'app' && event.event.type === 'error') errors.push(event.event);
        },
      ],
    });

    app.publish({ type: 'init' });
    app.drain();

    expect(log).toEqual(['service:init', 'main:init', 'service:error', 'main:error']);
    expect(errors).toEqual([{ type: 'error', kind: 'invalid_state', message: 'nothing to do', source: 'service boom' }]);
  });

  it('only logs failures raised while handling an error event', () => {
    const stack = new ViewStack(new RecordingView('main', log, 'main', true));
    const app = createApp({ stack });

    app.publish({ type: 'init' });

    expect(app.drain()).toBe(2);
    expect(log).toEqual(['main:init', 'main:error']);
    expect(app.bus.pending).toBe(0);
  });

  it('publishes the results of spawned tasks once they settle', async () => {
    const app = createApp({
      services: [
        recordingService(log, (event, context) => {
          if (event.type === 'init') {
            context.spawn('slow', async () => [{ type: 'reviews_load' }]);
          }
          if (event.type === 'reviews_load') {
            context.spawn('failing', async () => {
              throw new InvalidStateError('task failed');
            });
          }
          return [];
        }),
      ],
    });

    app.publish({ type: 'init' });
    await app.settle();

    expect(log).toEqual(['service:init', 'main:init', 'service:reviews_load', 'main:reviews_load', 'service:error', 'main:error']);
    expect(app.pendingTasks).toBe(0);
  });

  it('stops dispatching after quit', async () => {
    const app = createApp({ globalHandlers: [navigationHandler] });
    const afterDispatch = vi.fn();

    app.publish({ type: 'quit' });
    app.publish({ type: 'init' });
    await app.run(afterDispatch);

    expect(app.isRunning).toBe(false);
    expect(afterDispatch).toHaveBeenCalledTimes(1);
    expect(log).toEqual(['main:quit']);
    expect(app.bus.pending).toBe(1);
  });
});

describe('EventBus', () => {
  it('freezes payloads on publish', () => {
    const bus = new EventBus();
    const event: AppEvent = { type: 'file_views_loaded', reviewId: 'review-1', filePaths: ['src/a.ts'] };

    bus.publish(appEvent(event));

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.filePaths)).toBe(true);
  });

  it('hands an event to a waiting consumer', async () => {
    const bus = new EventBus();
    const next = bus.next();

    bus.publish(tickEvent());

    await expect(next).resolves.toEqual({ kind: 'tick' });
    expect(bus.pending).toBe(0);
  });

  it('delivers in publish order', () => {
    const bus = new EventBus();
    bus.publish(appEvent({ type: 'init' }));
    bus.publish(tickEvent());

    expect(bus.tryNext()).toEqual({ kind: 'app', event: { type: 'init' } });
    expect(bus.tryNext()).toEqual({ kind: 'tick' });
    expect(bus.tryNext()).toBeNull();
  });
});
