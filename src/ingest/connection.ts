import events from "events";

export enum ConnectionState {
  Disconnected = "disconnected",
  Connecting = "connecting",
  Connected = "connected",
}

export interface ConnectionLifecycle extends events.EventEmitter {
  on(
    event: "change",
    listener: (next: ConnectionState, previous: ConnectionState) => void
  ): this;
  /** emitted on every entry into Connected, i.e. once per (re)connect */
  on(event: "connected", listener: () => void): this;
  on(event: "disconnected", listener: (reason?: string) => void): this;

  emit(
    event: "change",
    next: ConnectionState,
    previous: ConnectionState
  ): boolean;
  emit(event: "connected"): boolean;
  emit(event: "disconnected", reason?: string): boolean;
}

/**
 * Connection state of the ingestion side, driven only by transport
 * callbacks. Retry and backoff stay with the transport client.
 */
export class ConnectionLifecycle extends events.EventEmitter {
  private current = ConnectionState.Disconnected;

  constructor(readonly broker: string) {
    super();
  }

  get state(): ConnectionState {
    return this.current;
  }

  isConnected(): boolean {
    return this.current === ConnectionState.Connected;
  }

  connecting(): void {
    this.transition(ConnectionState.Connecting);
  }

  connected(): void {
    if (this.transition(ConnectionState.Connected)) {
      this.emit("connected");
    }
  }

  disconnected(reason?: string): void {
    if (this.transition(ConnectionState.Disconnected)) {
      this.emit("disconnected", reason);
    }
  }

  private transition(next: ConnectionState): boolean {
    const previous = this.current;
    if (previous === next) {
      return false;
    }
    this.current = next;
    this.emit("change", next, previous);
    return true;
  }
}
