import { Agent, setGlobalDispatcher, type Dispatcher } from 'undici';

// Request deadlines are enforced by the engine (abort signals), not by the socket layer
export function installHttpDispatcher(opts: { keepAliveTimeoutMs?: number } = {}): Dispatcher {
  const dispatcher = new Agent({
    headersTimeout: 0,
    bodyTimeout: 0,
    keepAliveTimeout: opts.keepAliveTimeoutMs ?? 10_000,
  });
  setGlobalDispatcher(dispatcher);
  return dispatcher;
}
