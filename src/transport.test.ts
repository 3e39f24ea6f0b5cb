import test from "node:test";
import assert from "node:assert/strict";
import net from "node:net";
import { ExchangeServer } from "./transport/exchange-server.js";
import { exchange } from "./transport/exchange-client.js";
import { createLogger } from "./log.js";
import { ProtocolError, TransportError } from "./errors.js";

const log = createLogger("transport-test", "silent");

async function startServer(
  handler: ConstructorParameters<typeof ExchangeServer>[0],
  options: { readTimeoutMs?: number; maxMessageBytes?: number; idleDispatchMs?: number } = {}
) {
  const server = new ExchangeServer(handler, { log, ...options });
  const { port } = await server.listen(0, "127.0.0.1");
  return { server, endpoint: { host: "127.0.0.1", port } };
}

/** Raw socket that writes without half-closing and collects whatever comes back. */
function rawExchange(port: number, payload: string): Promise<{ data: string; ended: boolean }> {
  return new Promise((resolve) => {
    const socket = net.connect({ host: "127.0.0.1", port });
    let data = "";
    let ended = false;
    socket.on("connect", () => socket.write(payload));
    socket.on("data", (chunk: Buffer) => {
      data += chunk.toString("utf8");
    });
    socket.on("end", () => {
      ended = true;
    });
    socket.on("error", () => undefined);
    socket.on("close", () => resolve({ data, ended }));
  });
}

test("one request and one reply per connection", async () => {
  const seen: string[] = [];
  const { server, endpoint } = await startServer((message) => {
    seen.push(message);
    return `echo:${message}`;
  });

  assert.equal(await exchange(endpoint, "ping", 1000), "echo:ping");
  assert.equal(await exchange(endpoint, "pong", 1000), "echo:pong");
  assert.deepEqual(seen, ["ping", "pong"]);

  await server.close();
});

test("null reply closes the connection without data", async () => {
  const { server, endpoint } = await startServer(() => null);
  assert.equal(await exchange(endpoint, "TASK|FINISH|1.0", 1000), "");
  await server.close();
});

test("a newline ends the request even if the peer keeps its side open", async () => {
  const { server, endpoint } = await startServer((message) => message.toUpperCase());
  const result = await rawExchange(endpoint.port, "hello\nignored");
  assert.equal(result.data, "HELLO");
  await server.close();
});

test("a throwing handler drops that connection and the server keeps serving", async () => {
  const { server, endpoint } = await startServer((message) => {
    if (message === "bad") throw new ProtocolError("unknown_message", "bad message");
    return "ok";
  });

  assert.equal(await exchange(endpoint, "bad", 1000), "");
  assert.equal(await exchange(endpoint, "good", 1000), "ok");

  await server.close();
});

test("a sender that connects and stays silent is cut off by the read timeout", async () => {
  let calls = 0;
  const { server, endpoint } = await startServer(
    () => {
      calls += 1;
      return "late";
    },
    { readTimeoutMs: 50 }
  );

  const result = await rawExchange(endpoint.port, "");
  assert.equal(result.data, "");
  assert.equal(calls, 0);

  await server.close();
});

test("an unterminated request is answered once the sender goes quiet", async () => {
  const seen: string[] = [];
  const { server, endpoint } = await startServer(
    (message) => {
      seen.push(message);
      return message.toLowerCase();
    },
    { idleDispatchMs: 20, readTimeoutMs: 5000 }
  );

  const result = await rawExchange(endpoint.port, "TASK|REQUEST");
  assert.deepEqual(result, { data: "task|request", ended: true });
  assert.deepEqual(seen, ["TASK|REQUEST"]);

  await server.close();
});

test("bytes arriving before the quiet period ends belong to the same request", async () => {
  const { server, endpoint } = await startServer((message) => `got:${message}`, {
    idleDispatchMs: 200,
  });

  const data = await new Promise<string>((resolve) => {
    const socket = net.connect({ host: "127.0.0.1", port: endpoint.port });
    let received = "";
    socket.on("connect", () => {
      socket.write("TASK|");
      setTimeout(() => socket.write("REQUEST"), 20);
    });
    socket.on("data", (chunk: Buffer) => {
      received += chunk.toString("utf8");
    });
    socket.on("error", () => undefined);
    socket.on("close", () => resolve(received));
  });
  assert.equal(data, "got:TASK|REQUEST");

  await server.close();
});

test("oversized requests are dropped before the handler runs", async () => {
  let calls = 0;
  const { server, endpoint } = await startServer(
    () => {
      calls += 1;
      return "ok";
    },
    { maxMessageBytes: 16 }
  );

  const result = await rawExchange(endpoint.port, `${"x".repeat(64)}\n`);
  assert.equal(result.data, "");
  assert.equal(calls, 0);

  await server.close();
});

test("close waits for handlers already running", async () => {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const { server, endpoint } = await startServer(async () => {
    await gate;
    return "finished";
  });

  const pending = exchange(endpoint, "slow", 2000);
  while (server.inFlight === 0) await new Promise((r) => setTimeout(r, 5));

  const closing = server.close();
  release();
  assert.equal(await pending, "finished");
  await closing;
});

test("client reports an unreachable peer as TransportError", async () => {
  const { server, endpoint } = await startServer(() => "unused");
  await server.close();

  await assert.rejects(
    exchange(endpoint, "ping", 500),
    (err: unknown) => err instanceof TransportError && err.code === "exchange_failed"
  );
});
