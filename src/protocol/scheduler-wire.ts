import { isRecord, type TaskParameters, type TaskSpec } from "../contracts.js";
import { ProtocolError } from "../errors.js";

// Scheduler control protocol: `|`-delimited text, one request per connection.
//
//   REGISTER|REQUEST|<hostname>          -> REGISTER|CONFIRM|true|<scheduler_hostname>
//   TASK|REQUEST[|<node_id>]             -> TASK|ASSIGN|<type>|<json> or TASK|ASSIGN|REST
//   TASK|FINISH|<seconds>[|<node_id>]    -> (no reply)

const SEP = "|";
export const REST = "REST";

export type SchedulerRequest =
  | { type: "register"; hostname: string }
  | { type: "request"; nodeId?: string }
  | { type: "finish"; durationSeconds: number; nodeId?: string };

export type AssignReply =
  | { kind: "rest" }
  | { kind: "task"; taskType: string; parameters: TaskParameters };

export function parseSchedulerRequest(raw: string): SchedulerRequest {
  const fields = raw.trim().split(SEP);
  if (fields.length < 2) throw new ProtocolError("short_message", `message too short: "${raw}"`);

  const [verb, action, ...rest] = fields;

  if (verb === "REGISTER" && action === "REQUEST") {
    const hostname = rest[0]?.trim();
    if (!hostname) throw new ProtocolError("missing_hostname", "REGISTER without hostname");
    return { type: "register", hostname };
  }

  if (verb === "TASK" && action === "REQUEST") {
    return { type: "request", nodeId: optionalField(rest[0]) };
  }

  if (verb === "TASK" && action === "FINISH") {
    const rawDuration = rest[0]?.trim() ?? "";
    const durationSeconds = Number(rawDuration);
    if (rawDuration === "" || !Number.isFinite(durationSeconds)) {
      throw new ProtocolError("invalid_duration", `invalid duration value "${rawDuration}"`);
    }
    return { type: "finish", durationSeconds, nodeId: optionalField(rest[1]) };
  }

  throw new ProtocolError("unknown_message", `unrecognised message "${raw}"`);
}

export function formatRegister(hostname: string): string {
  return ["REGISTER", "REQUEST", hostname].join(SEP);
}

export function formatTaskRequest(nodeId?: string): string {
  return nodeId ? ["TASK", "REQUEST", nodeId].join(SEP) : ["TASK", "REQUEST"].join(SEP);
}

export function formatFinish(durationSeconds: number, nodeId?: string): string {
  const fields = ["TASK", "FINISH", String(durationSeconds)];
  if (nodeId) fields.push(nodeId);
  return fields.join(SEP);
}

export function formatRegisterConfirm(schedulerHostname: string): string {
  return ["REGISTER", "CONFIRM", "true", schedulerHostname].join(SEP);
}

export function parseRegisterConfirm(raw: string): { confirmed: boolean; schedulerHostname?: string } {
  const fields = raw.trim().split(SEP);
  if (fields[0] !== "REGISTER" || fields[1] !== "CONFIRM") return { confirmed: false };
  return { confirmed: fields[2] === "true", schedulerHostname: optionalField(fields[3]) };
}

export function formatAssign(task: TaskSpec | null): string {
  if (!task) return ["TASK", "ASSIGN", REST].join(SEP);
  return ["TASK", "ASSIGN", task.type, JSON.stringify(task.parameters)].join(SEP);
}

export function parseAssign(raw: string): AssignReply {
  const fields = raw.trim().split(SEP);
  if (fields[0] !== "TASK" || fields[1] !== "ASSIGN" || fields.length < 3) {
    throw new ProtocolError("unexpected_reply", `unexpected scheduler reply "${raw}"`);
  }
  if (fields[2] === REST) return { kind: "rest" };

  const taskType = fields[2];
  const json = fields.slice(3).join(SEP);
  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch (err) {
    throw new ProtocolError("invalid_parameters", `parameters for ${taskType} are not JSON`, {
      cause: err,
    });
  }
  return { kind: "task", taskType, parameters: toParameters(decoded, taskType) };
}

function toParameters(value: unknown, taskType: string): TaskParameters {
  if (!isRecord(value)) {
    throw new ProtocolError("invalid_parameters", `parameters for ${taskType} must be an object`);
  }
  const parameters: TaskParameters = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== "number" || !Number.isFinite(v)) {
      throw new ProtocolError("invalid_parameters", `parameter ${key} of ${taskType} is not a number`);
    }
    parameters[key] = v;
  }
  return parameters;
}

function optionalField(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
