import net from "node:net";
import type { AddressInfo } from "node:net";
import type { Log } from "../log.js";
import { BenchmeshError, errorMessage } from "../errors.js";

const DEFAULT_READ_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_MESSAGE_BYTES = 64 * 1024;
const DEFAULT_IDLE_DISPATCH_MS = 100;
const NEWLINE = 0x0a;

export interface PeerInfo {
  address: string;
  port: number;
}

/** Returns the reply to write back, or null to close without one. */
export type ExchangeHandler = (message: string, peer: PeerInfo) => Promise<string | null> | string | null;

export interface ExchangeServerOptions {
  log: Log;
  readTimeoutMs?: number;
  maxMessageBytes?: number;
  /** Quiet period after the last byte before an unterminated request is dispatched. */
  idleDispatchMs?: number;
}

/**
 * TCP server where every connection carries exactly one request and at most
 * one reply. A request ends at the first newline, when the peer half-closes,
 * or once the peer has sent bytes and then gone quiet for `idleDispatchMs`.
 */
export class ExchangeServer {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly pending = new Set<Promise<void>>();
  private readonly log: Log;
  private readonly readTimeoutMs: number;
  private readonly maxMessageBytes: number;
  private readonly idleDispatchMs: number;

  constructor(
    private readonly handler: ExchangeHandler,
    options: ExchangeServerOptions
  ) {
    this.log = options.log;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.idleDispatchMs = options.idleDispatchMs ?? DEFAULT_IDLE_DISPATCH_MS;
    this.server = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    this.server.on("error", (err) => this.log.error({ err }, "exchange server error"));
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(port, host, () => {
        this.server.off("error", reject);
        resolve(this.address());
      });
    });
  }

  address(): AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new BenchmeshError("not_listening", "exchange server is not bound to a TCP port");
    }
    return address;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /** Stops accepting, lets running handlers reply, then drops idle sockets. */
  async close(): Promise<void> {
    const closed = this.server.listening
      ? new Promise<void>((resolve, reject) =>
          this.server.close((err) => (err ? reject(err) : resolve()))
        )
      : Promise.resolve();

    await Promise.allSettled([...this.pending]);
    for (const socket of this.sockets) socket.destroy();
    await closed;
  }

  private accept(socket: net.Socket) {
    const peer: PeerInfo = {
      address: socket.remoteAddress ?? "unknown",
      port: socket.remotePort ?? 0,
    };
    this.sockets.add(socket);
    socket.once("close", () => this.sockets.delete(socket));
    socket.setTimeout(this.readTimeoutMs);

    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;
    let idle: ReturnType<typeof setTimeout> | undefined;

    const stopIdle = () => {
      if (idle !== undefined) clearTimeout(idle);
      idle = undefined;
    };

    const buffered = () => Buffer.concat(chunks).toString("utf8");

    const complete = (raw: string) => {
      if (settled) return;
      settled = true;
      stopIdle();
      socket.setTimeout(0);
      const task: Promise<void> = this.dispatch(socket, raw, peer).finally(() =>
        this.pending.delete(task)
      );
      this.pending.add(task);
    };

    socket.on("data", (chunk: Buffer) => {
      if (settled) return;
      size += chunk.length;
      if (size > this.maxMessageBytes) {
        settled = true;
        stopIdle();
        this.log.warn({ peer, size }, "request exceeds size limit, dropping connection");
        socket.destroy();
        return;
      }
      chunks.push(chunk);
      const nl = chunk.indexOf(NEWLINE);
      if (nl >= 0) {
        const all = Buffer.concat(chunks);
        complete(all.subarray(0, all.indexOf(NEWLINE)).toString("utf8"));
        return;
      }
      // Senders that neither terminate nor half-close still expect an answer.
      stopIdle();
      idle = setTimeout(() => complete(buffered()), this.idleDispatchMs);
    });

    socket.on("end", () => complete(buffered()));
    socket.on("close", stopIdle);

    socket.on("timeout", () => {
      if (settled) return;
      settled = true;
      this.log.warn({ peer, timeoutMs: this.readTimeoutMs }, "read timeout, dropping connection");
      socket.destroy();
    });

    socket.on("error", (err) => {
      this.log.debug({ peer, err: errorMessage(err) }, "connection error");
    });
  }

  private async dispatch(socket: net.Socket, raw: string, peer: PeerInfo): Promise<void> {
    const message = raw.trim();
    if (!message) {
      this.log.debug({ peer }, "empty request");
      socket.end();
      return;
    }

    try {
      const reply = await this.handler(message, peer);
      if (socket.destroyed) return;
      // Resolve only once the reply is flushed, so close() cannot cut it off.
      await new Promise<void>((resolve) => {
        if (reply === null) socket.end(() => resolve());
        else socket.end(reply, () => resolve());
      });
    } catch (err) {
      const code = err instanceof BenchmeshError ? err.code : "handler_failed";
      this.log.warn({ peer, code, err: errorMessage(err) }, "request rejected, dropping connection");
      socket.destroy();
    }
  }
}
