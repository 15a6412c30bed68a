/**
 * Order lifecycle events
 */

export { EventDispatcherImpl } from './event-dispatcher.impl';
export { LoggingEventHandler } from './handlers/logging.handler';
