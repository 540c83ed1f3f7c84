/**
 * Process-lifetime cache with single-flight loading: concurrent first-time
 * requests for a key share one in-flight load, and failed loads are not stored.
 */
export class LoadingCache<K, V> {
  private loader: (key: K) => Promise<V>;
  private cache: Map<K, { value: V; loadedAt: number }>;
  private inFlight: Map<K, Promise<V>>;

  constructor(loader: (key: K) => Promise<V>) {
    this.loader = loader;
    this.cache = new Map();
    this.inFlight = new Map();
  }

  getOrLoad(key: K): Promise<V> {
    const entry = this.cache.get(key);
    if (entry) {
      console.log(`Cache hit for ${String(key)}`);
      return Promise.resolve(entry.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    // Only the load still registered for the key may store its result;
    // `delete` and `clear` detach loads that are already running
    const load: Promise<V> = this.loader(key).then(
      (value) => {
        if (this.inFlight.get(key) === load) {
          this.cache.set(key, { value, loadedAt: Date.now() });
          this.inFlight.delete(key);
        }
        return value;
      },
      (error: unknown) => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
        throw error;
      }
    );
    this.inFlight.set(key, load);
    return load;
  }

  get(key: K): V | undefined {
    return this.cache.get(key)?.value;
  }

  // Milliseconds since epoch at which the key finished loading
  loadedAt(key: K): number | undefined {
    return this.cache.get(key)?.loadedAt;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  delete(key: K): boolean {
    const hadPending = this.inFlight.delete(key);
    return this.cache.delete(key) || hadPending;
  }

  clear(): void {
    this.cache.clear();
    this.inFlight.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
