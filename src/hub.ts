import { describeError } from "./errors.js";
import { debug } from "./log.js";

const TAG = "Hub";

/**
 * Outbound side of one authenticated session. `deliver` must only hand the
 * frame off (e.g. queue it on a socket); it must never wait for the peer.
 */
export interface FrameSink {
  deliver(frame: Buffer): void;
}

export interface ClientConnection {
  readonly id: string;
  /** False once the connection has been unregistered. */
  readonly alive: boolean;
}

class Member implements ClientConnection {
  alive = true;

  constructor(
    readonly id: string,
    readonly sink: FrameSink
  ) {}
}

/**
 * Registry of authenticated tunnel connections.
 *
 * Everything runs on the event loop, so register/unregister can never
 * interleave with an in-flight broadcast; broadcast still walks a snapshot
 * because a sink may unregister its own member synchronously.
 */
export class Hub {
  private readonly members = new Map<string, Member>();
  private nextId = 0;

  get size(): number {
    return this.members.size;
  }

  register(sink: FrameSink): ClientConnection {
    const member = new Member(`c${++this.nextId}`, sink);
    this.members.set(member.id, member);
    debug(TAG, `Registered ${member.id} (${this.members.size} member(s))`);
    return member;
  }

  unregister(connection: ClientConnection): void {
    const member = this.members.get(connection.id);
    if (!member) return;
    member.alive = false;
    this.members.delete(connection.id);
    debug(TAG, `Unregistered ${member.id} (${this.members.size} member(s))`);
  }

  has(connection: ClientConnection): boolean {
    return this.members.has(connection.id);
  }

  /** Hand `frame` to every member. Returns how many members took it. */
  broadcast(frame: Buffer): number {
    let delivered = 0;
    for (const member of [...this.members.values()]) {
      if (!member.alive) continue;
      try {
        member.sink.deliver(frame);
        delivered++;
      } catch (err) {
        console.warn(`[${TAG}] Delivery to ${member.id} failed: ${describeError(err)}`);
      }
    }
    return delivered;
  }
}
