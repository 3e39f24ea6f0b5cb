import net from "node:net";
import type { Endpoint } from "../contracts.js";
import { TransportError, errorMessage } from "../errors.js";

/**
 * Opens a fresh connection, writes `message`, half-closes and resolves with
 * whatever the peer sends before it closes (an empty string for no reply).
 */
export function exchange(endpoint: Endpoint, message: string, timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: endpoint.host, port: endpoint.port });
    const chunks: Buffer[] = [];
    let done = false;

    const fail = (err: TransportError) => {
      if (done) return;
      done = true;
      socket.destroy();
      reject(err);
    };

    socket.setTimeout(timeoutMs);
    socket.on("connect", () => socket.end(`${message}\n`));
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    const settle = () => {
      if (done) return;
      done = true;
      resolve(Buffer.concat(chunks).toString("utf8").trim());
    };
    socket.on("end", settle);
    socket.on("close", (hadError) => {
      if (!hadError) settle();
    });
    socket.on("timeout", () =>
      fail(
        new TransportError(
          "exchange_timeout",
          `no answer from ${endpoint.host}:${endpoint.port} within ${timeoutMs}ms`
        )
      )
    );
    socket.on("error", (err) =>
      fail(
        new TransportError(
          "exchange_failed",
          `exchange with ${endpoint.host}:${endpoint.port} failed: ${errorMessage(err)}`,
          { cause: err }
        )
      )
    );
  });
}
