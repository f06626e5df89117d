import { AsyncQueue } from "@scenenet/scene-net-websocket";

import { ClientId } from "./OutboundEnvelope";

export type RegistryClient = {
  readonly id: ClientId;
  readonly outgoing: AsyncQueue<Uint8Array>;
};

export type ClientState = "pending" | "active";

/**
 * Tracks every connected client. A client starts pending, which keeps it out of broadcasts,
 * and becomes active once it has been sent the scene snapshot.
 */
export class ConnectionRegistry<C extends RegistryClient = RegistryClient> {
  private pending = new Map<ClientId, C>();
  private active = new Map<ClientId, C>();

  public get size(): number {
    return this.pending.size + this.active.size;
  }

  public addPending(client: C): boolean {
    if (this.stateOf(client.id) !== null) {
      return false;
    }
    this.pending.set(client.id, client);
    return true;
  }

  // False unless the client was pending
  public promote(clientId: ClientId): boolean {
    const client = this.pending.get(clientId);
    if (client === undefined) {
      return false;
    }
    this.pending.delete(clientId);
    this.active.set(clientId, client);
    return true;
  }

  public remove(clientId: ClientId): C | null {
    const client = this.pending.get(clientId) ?? this.active.get(clientId) ?? null;
    this.pending.delete(clientId);
    this.active.delete(clientId);
    return client;
  }

  public get(clientId: ClientId): C | null {
    return this.pending.get(clientId) ?? this.active.get(clientId) ?? null;
  }

  public getActive(clientId: ClientId): C | null {
    return this.active.get(clientId) ?? null;
  }

  public stateOf(clientId: ClientId): ClientState | null {
    if (this.pending.has(clientId)) {
      return "pending";
    }
    if (this.active.has(clientId)) {
      return "active";
    }
    return null;
  }

  public activeClients(): Array<C> {
    return Array.from(this.active.values());
  }

  public allClients(): Array<C> {
    return [...this.pending.values(), ...this.active.values()];
  }
}
