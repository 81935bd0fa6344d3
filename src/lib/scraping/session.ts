import { Agent, ProxyAgent, type Dispatcher } from "undici";
import { config } from "../config";
import { SessionClosedError, SessionNotOpenError } from "../errors";

export interface SessionOptions {
  timeoutMs?: number;
  connections?: number;
  keepAliveTimeoutMs?: number;
  proxyUrl?: string;
  /** Overrides dispatcher construction, e.g. with an undici MockAgent. */
  createDispatcher?: () => Dispatcher;
}

type SessionState = "idle" | "open" | "closed";

export function createDispatcher(options: SessionOptions = {}): Dispatcher {
  const {
    timeoutMs = config.timeoutMs,
    connections = config.maxConnections,
    keepAliveTimeoutMs = config.keepAliveTimeoutMs,
    proxyUrl = config.getProxyUrl(),
  } = options;

  if (proxyUrl) {
    return new ProxyAgent({ uri: proxyUrl, connections, keepAliveTimeout: keepAliveTimeoutMs });
  }

  return new Agent({
    connections,
    keepAliveTimeout: keepAliveTimeoutMs,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    connect: { timeout: timeoutMs },
  });
}

/**
 * One connection pool, opened once and closed once. Reopening a closed
 * session is not supported.
 */
export class HttpSession {
  private state: SessionState = "idle";
  private current: Dispatcher | null = null;

  constructor(private readonly options: SessionOptions = {}) {}

  get isOpen(): boolean {
    return this.state === "open";
  }

  get isClosed(): boolean {
    return this.state === "closed";
  }

  get dispatcher(): Dispatcher {
    if (this.state === "closed") throw new SessionClosedError();
    if (!this.current) throw new SessionNotOpenError();
    return this.current;
  }

  open(): void {
    if (this.state === "closed") throw new SessionClosedError();
    if (this.state === "open") return;
    this.current = this.options.createDispatcher
      ? this.options.createDispatcher()
      : createDispatcher(this.options);
    this.state = "open";
    console.log("[session] opened");
  }

  async close(): Promise<void> {
    if (this.state === "closed") {
      console.warn("[session] already closed");
      return;
    }
    const dispatcher = this.current;
    this.current = null;
    this.state = "closed";
    if (dispatcher) {
      await dispatcher.close();
      console.log("[session] closed");
    }
  }
}
