// @adobe/data/ecs opens `globalThis.caches` while it loads, and Node has no
// CacheStorage. Import this module before anything that reaches the ecs.

type CacheRequest = string | URL | Request;

export interface MemoryCache {
  readonly add: (request: CacheRequest) => Promise<void>;
  readonly addAll: (requests: readonly CacheRequest[]) => Promise<void>;
  readonly delete: (request: CacheRequest) => Promise<boolean>;
  readonly keys: () => Promise<readonly Request[]>;
  readonly match: (request: CacheRequest) => Promise<Response | undefined>;
  readonly matchAll: () => Promise<readonly Response[]>;
  readonly put: (request: CacheRequest, response: Response) => Promise<void>;
}

export interface MemoryCacheStorage {
  readonly delete: (cacheName: string) => Promise<boolean>;
  readonly has: (cacheName: string) => Promise<boolean>;
  readonly keys: () => Promise<string[]>;
  readonly match: (request: CacheRequest) => Promise<Response | undefined>;
  readonly open: (cacheName: string) => Promise<MemoryCache>;
}

const requestToKey = async (input: CacheRequest): Promise<string> => {
  const request = input instanceof Request ? input : new Request(input);
  const body = request.method === "GET" || request.method === "HEAD" ? "" : await request.clone().text();
  return JSON.stringify({
    method: request.method,
    url: request.url,
    body
  });
};

const createMemoryCache = (): MemoryCache => {
  const store = new Map<string, Response>();

  return {
    add: async (_request) => {},
    addAll: async (_requests) => {},
    delete: async (request) => store.delete(await requestToKey(request)),
    keys: async () => [],
    match: async (request) => store.get(await requestToKey(request))?.clone(),
    matchAll: async () => [],
    put: async (request, response) => {
      store.set(await requestToKey(request), response.clone());
    }
  };
};

export const createMemoryCacheStorage = (): MemoryCacheStorage => {
  const cachesByName = new Map<string, MemoryCache>();

  return {
    delete: async (cacheName) => cachesByName.delete(cacheName),
    has: async (cacheName) => cachesByName.has(cacheName),
    keys: async () => [...cachesByName.keys()],
    match: async (request) => {
      for (const cache of cachesByName.values()) {
        const response = await cache.match(request);
        if (response) {
          return response;
        }
      }
      return undefined;
    },
    open: async (cacheName) => {
      const existing = cachesByName.get(cacheName);
      if (existing) {
        return existing;
      }
      const next = createMemoryCache();
      cachesByName.set(cacheName, next);
      return next;
    }
  };
};

export const installCachesPolyfill = (): void => {
  if ("caches" in globalThis) {
    return;
  }
  (globalThis as { caches?: MemoryCacheStorage }).caches = createMemoryCacheStorage();
};

installCachesPolyfill();
