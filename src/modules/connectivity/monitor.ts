import { promises as dns } from "node:dns";
import { NetworkError } from "../../errors";

export type ConnectivityStatus = "online" | "offline" | "unknown";

export interface ConnectivityMonitor {
  status(): ConnectivityStatus;
}

export type ConnectivityListener = (status: ConnectivityStatus) => void;

/** Fixed status; flip it by hand. */
export class StaticConnectivity implements ConnectivityMonitor {
  constructor(private current: ConnectivityStatus = "unknown") {}

  status() {
    return this.current;
  }

  set(status: ConnectivityStatus) {
    this.current = status;
  }
}

type Lookup = (hostname: string) => Promise<unknown>;

export type DnsConnectivityOptions = {
  host: string;
  lookup?: Lookup;
};

/**
 * Online means the API host resolves. Status stays "unknown" until the first check.
 */
export class DnsConnectivityMonitor implements ConnectivityMonitor {
  private current: ConnectivityStatus = "unknown";
  private readonly listeners = new Set<ConnectivityListener>();
  private readonly lookup: Lookup;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: DnsConnectivityOptions) {
    this.lookup = opts.lookup ?? ((hostname) => dns.lookup(hostname));
  }

  status() {
    return this.current;
  }

  async checkNow(): Promise<ConnectivityStatus> {
    let next: ConnectivityStatus;
    try {
      await this.lookup(this.opts.host);
      next = "online";
    } catch (e) {
      if (process.env.DEBUG_AI === "1") console.log(`[connectivity] lookup ${this.opts.host} failed:`, e);
      next = "offline";
    }

    if (next !== this.current) {
      this.current = next;
      console.log(`[connectivity] ${next}`);
      for (const l of this.listeners) l(next);
    }
    return next;
  }

  start(intervalMs = 30_000) {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.checkNow().catch((e) => console.warn("[connectivity] check failed:", e));
    }, intervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export function hostOf(baseUrl: string): string {
  return new URL(baseUrl).hostname;
}

export function requireNetwork(monitor: ConnectivityMonitor) {
  if (monitor.status() === "offline") throw NetworkError.noConnection();
}
