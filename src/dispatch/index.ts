/**
 * Message dispatch and request answering.
 *
 * @module dispatch
 */

export {
  Dispatcher,
  type CallOptions,
  type DispatcherOptions,
  type InboundSink,
  type ResultParser,
} from './dispatcher.js';

export {
  createHandlerTable,
  createRequestResponder,
  type AuthGate,
  type HandlerTable,
  type RequestContext,
  type RequestHandler,
  type RequestResponderOptions,
} from './responder.js';
