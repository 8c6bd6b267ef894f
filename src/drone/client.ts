/**
 * Drone REST client. Bearer-token auth, no retries: a non-2xx status or an
 * unexpected body throws and the caller decides whether that is fatal.
 */

import type {
  Build,
  DroneUser,
  LogLine,
  PipelineBackend,
  Stage,
  Step,
} from "./types.js";

const USER_AGENT = "drone-step-comment/1.0";

export type FetchLike = typeof fetch;

export interface DroneClientOptions {
  /** Server address, e.g. https://drone.example.com */
  server: string;
  token: string;
  fetch?: FetchLike;
}

export class DroneApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly path: string,
  ) {
    super(message);
    this.name = "DroneApiError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function num(obj: Record<string, unknown>, key: string, what: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new Error(`drone: ${what} has no numeric "${key}"`);
  }
  return v;
}

function str(obj: Record<string, unknown>, key: string, what: string): string {
  const v = obj[key];
  if (typeof v !== "string") {
    throw new Error(`drone: ${what} has no string "${key}"`);
  }
  return v;
}

function parseStep(raw: unknown): Step {
  if (!isRecord(raw)) throw new Error("drone: step is not an object");
  return {
    id: num(raw, "id", "step"),
    number: num(raw, "number", "step"),
    name: str(raw, "name", "step"),
    status: str(raw, "status", "step"),
  };
}

function parseStage(raw: unknown): Stage {
  if (!isRecord(raw)) throw new Error("drone: stage is not an object");
  // Stages that never started come back without a steps array.
  const steps = Array.isArray(raw.steps) ? raw.steps.map(parseStep) : [];
  return {
    id: num(raw, "id", "stage"),
    number: num(raw, "number", "stage"),
    name: str(raw, "name", "stage"),
    status: str(raw, "status", "stage"),
    steps,
  };
}

export function parseBuild(raw: unknown): Build {
  if (!isRecord(raw)) throw new Error("drone: build is not an object");
  const stages = Array.isArray(raw.stages) ? raw.stages.map(parseStage) : [];
  return {
    id: num(raw, "id", "build"),
    number: num(raw, "number", "build"),
    status: str(raw, "status", "build"),
    stages,
  };
}

export function parseLogLines(raw: unknown): LogLine[] {
  // Drone answers null for a step that produced no output.
  if (raw === null) return [];
  if (!Array.isArray(raw)) throw new Error("drone: logs are not an array");
  return raw.map((line) => {
    if (!isRecord(line)) throw new Error("drone: log line is not an object");
    return {
      pos: typeof line.pos === "number" ? line.pos : 0,
      out: typeof line.out === "string" ? line.out : "",
      time: typeof line.time === "number" ? line.time : 0,
    };
  });
}

export class DroneClient implements PipelineBackend {
  private readonly server: string;
  private readonly token: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: DroneClientOptions) {
    this.server = options.server.replace(/\/+$/, "");
    this.token = options.token;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async get(path: string): Promise<unknown> {
    const fetchImpl = this.fetchImpl;
    const res = await fetchImpl(`${this.server}${path}`, {
      method: "GET",
      headers: {
        Accept: "application/json",
        Authorization: `Bearer ${this.token}`,
        "User-Agent": USER_AGENT,
      },
    });
    if (!res.ok) {
      throw new DroneApiError(
        `drone: GET ${path} failed with status ${res.status}`,
        res.status,
        path,
      );
    }
    return res.json();
  }

  async currentUser(): Promise<DroneUser> {
    const data = await this.get("/api/user");
    if (!isRecord(data)) throw new Error("drone: user is not an object");
    return { login: str(data, "login", "user") };
  }

  async fetchBuild(owner: string, repo: string, buildNumber: number): Promise<Build> {
    const path = `/api/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/builds/${buildNumber}`;
    return parseBuild(await this.get(path));
  }

  async fetchLogs(
    owner: string,
    repo: string,
    buildNumber: number,
    stageNumber: number,
    stepNumber: number,
  ): Promise<LogLine[]> {
    const path =
      `/api/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}` +
      `/builds/${buildNumber}/logs/${stageNumber}/${stepNumber}`;
    return parseLogLines(await this.get(path));
  }
}
