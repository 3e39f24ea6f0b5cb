import test from "node:test";
import assert from "node:assert/strict";
import {
  formatAssign,
  formatFinish,
  formatRegister,
  formatRegisterConfirm,
  formatTaskRequest,
  parseAssign,
  parseRegisterConfirm,
  parseSchedulerRequest,
} from "./protocol/scheduler-wire.js";
import { formatEventMessage, parseEventMessage } from "./protocol/event-wire.js";
import { ProtocolError } from "./errors.js";
import { createTaskSpec } from "./scheduling/task-set.js";

// ── Scheduler protocol ─────────────────────────────────────────────────────

test("REGISTER carries the hostname", () => {
  assert.equal(formatRegister("node-a"), "REGISTER|REQUEST|node-a");
  assert.deepEqual(parseSchedulerRequest("REGISTER|REQUEST|node-a"), {
    type: "register",
    hostname: "node-a",
  });
});

test("REGISTER without a hostname is a protocol error", () => {
  assert.throws(() => parseSchedulerRequest("REGISTER|REQUEST"), ProtocolError);
  assert.throws(() => parseSchedulerRequest("REGISTER|REQUEST|  "), ProtocolError);
});

test("TASK|REQUEST parses with and without a node id", () => {
  assert.deepEqual(parseSchedulerRequest("TASK|REQUEST"), { type: "request", nodeId: undefined });
  assert.deepEqual(parseSchedulerRequest(formatTaskRequest("node-b")), {
    type: "request",
    nodeId: "node-b",
  });
  assert.equal(formatTaskRequest(), "TASK|REQUEST");
});

test("TASK|FINISH parses the duration as seconds", () => {
  assert.equal(formatFinish(1.25, "node-c"), "TASK|FINISH|1.25|node-c");
  assert.deepEqual(parseSchedulerRequest("TASK|FINISH|1.25|node-c"), {
    type: "finish",
    durationSeconds: 1.25,
    nodeId: "node-c",
  });
  assert.deepEqual(parseSchedulerRequest("TASK|FINISH|3"), {
    type: "finish",
    durationSeconds: 3,
    nodeId: undefined,
  });
});

test("TASK|FINISH with a non-numeric duration is rejected", () => {
  assert.throws(
    () => parseSchedulerRequest("TASK|FINISH|fast"),
    (err: unknown) => err instanceof ProtocolError && err.code === "invalid_duration"
  );
  assert.throws(() => parseSchedulerRequest("TASK|FINISH|"), ProtocolError);
});

test("short and unknown messages are rejected", () => {
  assert.throws(
    () => parseSchedulerRequest("HELLO"),
    (err: unknown) => err instanceof ProtocolError && err.code === "short_message"
  );
  assert.throws(
    () => parseSchedulerRequest("TASK|CANCEL"),
    (err: unknown) => err instanceof ProtocolError && err.code === "unknown_message"
  );
});

test("ASSIGN encodes the task type and JSON parameters", () => {
  const task = createTaskSpec("matmul", { size: 425 });
  assert.equal(formatAssign(task), 'TASK|ASSIGN|matmul|{"size":425}');
  assert.deepEqual(parseAssign('TASK|ASSIGN|matmul|{"size":425}'), {
    kind: "task",
    taskType: "matmul",
    parameters: { size: 425 },
  });
});

test("ASSIGN REST is the poison pill", () => {
  assert.equal(formatAssign(null), "TASK|ASSIGN|REST");
  assert.deepEqual(parseAssign("TASK|ASSIGN|REST"), { kind: "rest" });
});

test("ASSIGN with broken parameters is rejected", () => {
  assert.throws(() => parseAssign("TASK|ASSIGN|matmul|{size"), ProtocolError);
  assert.throws(() => parseAssign('TASK|ASSIGN|matmul|{"size":"big"}'), ProtocolError);
  assert.throws(() => parseAssign("TASK|ASSIGN|matmul|[1,2]"), ProtocolError);
  assert.throws(() => parseAssign(""), ProtocolError);
});

test("registration confirmation round-trips the scheduler hostname", () => {
  assert.equal(formatRegisterConfirm("sched-1"), "REGISTER|CONFIRM|true|sched-1");
  assert.deepEqual(parseRegisterConfirm("REGISTER|CONFIRM|true|sched-1"), {
    confirmed: true,
    schedulerHostname: "sched-1",
  });
  assert.deepEqual(parseRegisterConfirm(""), { confirmed: false });
  assert.equal(parseRegisterConfirm("REGISTER|CONFIRM|false|sched-1").confirmed, false);
});

// ── Event protocol ─────────────────────────────────────────────────────────

test("event message parses all four keys", () => {
  assert.deepEqual(parseEventMessage("NODE W1 EVENT TASK_ASSIGNED TIME 100.0 TASK matmul", 5), {
    node: "W1",
    kind: "TASK_ASSIGNED",
    time: 100,
    taskName: "matmul",
  });
});

test("event keys may appear in any order and unknown tokens are skipped", () => {
  assert.deepEqual(
    parseEventMessage("hello TASK primes EXTRA NODE n2 EVENT TASK_FINISHED TIME 7.5", 0),
    { node: "n2", kind: "TASK_FINISHED", time: 7.5, taskName: "primes" }
  );
});

test("missing TIME falls back to the receipt time", () => {
  assert.deepEqual(parseEventMessage("NODE n1 EVENT TASK_REQUESTED", 42.5), {
    node: "n1",
    kind: "TASK_REQUESTED",
    time: 42.5,
  });
});

test("events without NODE or EVENT are rejected", () => {
  assert.throws(
    () => parseEventMessage("EVENT TASK_ASSIGNED TASK matmul", 0),
    (err: unknown) => err instanceof ProtocolError && err.code === "missing_fields"
  );
  assert.throws(() => parseEventMessage("NODE n1 TASK matmul", 0), ProtocolError);
  assert.throws(() => parseEventMessage("NODE", 0), ProtocolError);
});

test("unknown kinds, bad TIME and task-less ASSIGNED are rejected", () => {
  assert.throws(
    () => parseEventMessage("NODE n1 EVENT TASK_PAUSED", 0),
    (err: unknown) => err instanceof ProtocolError && err.code === "unknown_event"
  );
  assert.throws(
    () => parseEventMessage("NODE n1 EVENT TASK_REQUESTED TIME soon", 0),
    (err: unknown) => err instanceof ProtocolError && err.code === "invalid_time"
  );
  assert.throws(
    () => parseEventMessage("NODE n1 EVENT TASK_ASSIGNED TIME 1", 0),
    (err: unknown) => err instanceof ProtocolError && err.code === "missing_task"
  );
});

test("formatted events parse back to the same event", () => {
  const line = formatEventMessage({ node: "n3", kind: "TASK_FINISHED", time: 12.25, taskName: "array" });
  assert.equal(line, "NODE n3 EVENT TASK_FINISHED TIME 12.25 TASK array");
  assert.equal(
    formatEventMessage({ node: "n3", kind: "TASK_REQUESTED", time: 1 }),
    "NODE n3 EVENT TASK_REQUESTED TIME 1"
  );
});
