import { AsyncLocalStorage } from 'async_hooks';

/**
 * Per-call execution context bound by the auth gateway and read by the Graph client
 */
export interface RequestContextState {
  userId: string;
  accessToken: string;
}

export class RequestContext {
  private readonly storage = new AsyncLocalStorage<RequestContextState>();

  run<T>(state: RequestContextState, fn: () => T): T {
    return this.storage.run(state, fn);
  }

  get(): RequestContextState | undefined {
    return this.storage.getStore();
  }

  getAccessToken(): string | undefined {
    return this.storage.getStore()?.accessToken;
  }
}
