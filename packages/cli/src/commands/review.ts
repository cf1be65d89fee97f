import { createApp, openRuntime, type Runtime, type StartOptions } from '../app/bootstrap';
import { inputEvent, tickEvent } from '../events/event';
import { renderStack } from '../terminal/renderer';
import { Terminal } from '../terminal/terminal';

/**
 * Starts the interactive review UI and resolves once the user quits.
 */
export async function review(options: StartOptions): Promise<void> {
  let runtime: Runtime;
  try {
    runtime = await openRuntime(options);
  } catch (error) {
    if (error instanceof Error && error.message.includes('Not a git repository')) {
      throw new Error(`${error.message}\n  Run this command from inside a git repository.`);
    }
    throw error;
  }

  const terminal = new Terminal();
  try {
    terminal.enter();
  } catch (error) {
    runtime.database.close();
    throw error;
  }

  const { logger } = runtime;
  const app = createApp(runtime);
  const redraw = (): void => terminal.draw(renderStack(app.stack, terminal.size));

  const stopInput = terminal.onInput((input) => app.bus.publish(inputEvent(input)));
  const stopResize = terminal.onResize(redraw);
  const ticker = setInterval(() => app.bus.publish(tickEvent()), runtime.config.tickRateMs);

  app.publish({ type: 'init' });
  logger.info('Started');

  try {
    redraw();
    await app.run(redraw);
  } finally {
    clearInterval(ticker);
    stopInput();
    stopResize();
    terminal.restore();
    runtime.database.close();
    logger.info('Stopped');
  }
}
