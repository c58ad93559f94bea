import { AsyncLocalStorage } from "async_hooks";

export type RequestContextStore = {
  requestId: string;
  traceId?: string;
  spanId?: string;
  ip?: string;
  userAgent?: string;
};

const storage = new AsyncLocalStorage<RequestContextStore>();

export const RequestContext = {
  run<T>(store: RequestContextStore, callback: () => T) {
    return storage.run(store, callback);
  },
  get() {
    return storage.getStore();
  },
};
